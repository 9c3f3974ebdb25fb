/**
 * Linguistic analysis tool.
 * Passes one text, or a batch of texts, to the external feature provider.
 */

import { ValidationError } from '../errors.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { PlsEvaluationService } from '../services/PlsEvaluationService.js';
import type { LinguisticFeatures } from '../types/models.js';
import type { ITool, ToolDescriptor, ToolResponse } from '../types/tools.js';
import { runTool } from './run-tool.js';
import { readString, readStringArray } from './validate-parameters.js';

const MAX_BATCH = 50;

export interface TextAnalysis {
  textId: string;
  features: LinguisticFeatures;
}

export type LinguisticAnalysisResult =
  | { kind: 'single'; features: LinguisticFeatures }
  | { kind: 'batch'; analyses: TextAnalysis[]; totalTexts: number };

export class LinguisticAnalysisTool implements ITool<LinguisticAnalysisResult> {
  constructor(
    private readonly evaluationService: PlsEvaluationService,
    private readonly logProvider: ILogProvider
  ) {}

  info(): ToolDescriptor {
    return {
      name: 'linguistic_analysis',
      description:
        'Linguistic analysis of text: readability scores, POS distributions, entity and stylistic counts',
      version: '1.0.0',
      parameters: {
        text: { type: 'string', description: 'Text to analyze' },
        texts: {
          type: 'array',
          items: 'string',
          maxLength: MAX_BATCH,
          description: 'Texts to analyze (alternative to text)',
        },
        text_ids: {
          type: 'array',
          items: 'string',
          description: 'Optional IDs for each entry of texts',
        },
      },
    };
  }

  execute(params: Record<string, unknown>): Promise<ToolResponse<LinguisticAnalysisResult>> {
    return runTool(this.info(), params, this.logProvider, () => this.run(params));
  }

  private async run(params: Record<string, unknown>): Promise<LinguisticAnalysisResult> {
    const text = readString(params, 'text');
    const texts = readStringArray(params, 'texts');
    const textIds = readStringArray(params, 'text_ids');

    if (text) {
      return { kind: 'single', features: await this.evaluationService.analyze(text) };
    }

    if (!texts || texts.length === 0) {
      throw new ValidationError("Either 'text' or 'texts' parameter is required");
    }
    if (textIds && textIds.length !== texts.length) {
      throw new ValidationError("'text_ids' length must match 'texts' length", {
        texts: texts.length,
        textIds: textIds.length,
      });
    }

    const analyses: TextAnalysis[] = [];
    for (const [i, entry] of texts.entries()) {
      analyses.push({
        textId: textIds?.[i] ?? `text_${i + 1}`,
        features: await this.evaluationService.analyze(entry),
      });
    }

    return { kind: 'batch', analyses, totalTexts: analyses.length };
  }
}
