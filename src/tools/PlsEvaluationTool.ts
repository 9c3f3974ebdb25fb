/**
 * PLS evaluation tool.
 * Rates a text against the plain-language-summary thresholds, as structured
 * data or as a readable report.
 */

import { ValidationError } from '../errors.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { PlsEvaluationService } from '../services/PlsEvaluationService.js';
import type { PlsEvaluation } from '../types/models.js';
import type { ITool, ToolDescriptor, ToolResponse } from '../types/tools.js';
import { runTool } from './run-tool.js';
import { readString } from './validate-parameters.js';

export type PlsEvaluationResult =
  | { format: 'json'; evaluation: PlsEvaluation }
  | { format: 'text'; report: string };

export class PlsEvaluationTool implements ITool<PlsEvaluationResult> {
  constructor(
    private readonly evaluationService: PlsEvaluationService,
    private readonly logProvider: ILogProvider
  ) {}

  info(): ToolDescriptor {
    return {
      name: 'pls_evaluation',
      description:
        'Evaluate text against Plain Language Summary thresholds and provide improvement recommendations',
      version: '1.0.0',
      parameters: {
        text: { type: 'string', required: true, description: 'Text to evaluate for PLS compliance' },
        format: {
          type: 'string',
          enum: ['json', 'text'],
          description: "'json' for structured data or 'text' for a readable report (default json)",
        },
      },
    };
  }

  execute(params: Record<string, unknown>): Promise<ToolResponse<PlsEvaluationResult>> {
    return runTool(this.info(), params, this.logProvider, () => this.run(params));
  }

  private async run(params: Record<string, unknown>): Promise<PlsEvaluationResult> {
    const text = readString(params, 'text');
    if (!text) {
      throw new ValidationError("'text' parameter is required");
    }

    if (readString(params, 'format') === 'text') {
      return { format: 'text', report: await this.evaluationService.evaluateAsText(text) };
    }
    return { format: 'json', evaluation: await this.evaluationService.evaluate(text) };
  }
}
