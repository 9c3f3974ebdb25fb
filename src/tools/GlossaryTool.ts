/**
 * Glossary tools: span-reporting matches and the presence-only variant.
 */

import type { ILogProvider } from '../providers/ILogProvider.js';
import type { GlossaryService } from '../services/GlossaryService.js';
import type { ParameterSchema } from '../types/common.js';
import type { MatchResult, PresenceResult } from '../types/models.js';
import type { ITool, ToolDescriptor, ToolResponse } from '../types/tools.js';
import { runTool } from './run-tool.js';
import { readString } from './validate-parameters.js';

const TEXT_PARAMETER: ParameterSchema = {
  text: { type: 'string', required: true, description: 'The text to analyze for medical terms' },
};

export class GlossaryTool implements ITool<MatchResult> {
  constructor(
    private readonly glossaryService: GlossaryService,
    private readonly logProvider: ILogProvider
  ) {}

  info(): ToolDescriptor {
    return {
      name: 'glossary',
      description:
        'Find and define complex medical phrases within a body of text with location information',
      version: '2.0.0',
      parameters: { ...TEXT_PARAMETER },
    };
  }

  execute(params: Record<string, unknown>): Promise<ToolResponse<MatchResult>> {
    return runTool(this.info(), params, this.logProvider, async () =>
      this.glossaryService.findMatches(readString(params, 'text') ?? '')
    );
  }
}

export class GlossaryPresenceTool implements ITool<PresenceResult> {
  constructor(
    private readonly glossaryService: GlossaryService,
    private readonly logProvider: ILogProvider
  ) {}

  info(): ToolDescriptor {
    return {
      name: 'glossary_presence',
      description: 'List which glossary phrases occur in a text, with their definitions',
      version: '1.0.0',
      parameters: { ...TEXT_PARAMETER },
    };
  }

  execute(params: Record<string, unknown>): Promise<ToolResponse<PresenceResult>> {
    return runTool(this.info(), params, this.logProvider, async () =>
      this.glossaryService.findPresentPhrases(readString(params, 'text') ?? '')
    );
  }
}
