/**
 * Dependency wiring.
 * Constructs all services and tools with their dependencies.
 * In production, dependencies come from container.production.ts;
 * tests pass in-memory mocks.
 */

import type { IGlossarySourceRepository } from './repositories/IGlossarySourceRepository.js';
import type { ILinguisticFeatureProvider } from './providers/ILinguisticFeatureProvider.js';
import type { ILogProvider } from './providers/ILogProvider.js';
import type { ThresholdTable } from './types/models.js';
import { GlossaryService } from './services/GlossaryService.js';
import { PlsEvaluationService } from './services/PlsEvaluationService.js';
import { ToolRegistry } from './tools/ToolRegistry.js';
import { GlossaryPresenceTool, GlossaryTool } from './tools/GlossaryTool.js';
import { LinguisticAnalysisTool } from './tools/LinguisticAnalysisTool.js';
import { PlsEvaluationTool } from './tools/PlsEvaluationTool.js';

export interface Container {
  glossaryService: GlossaryService;
  plsEvaluationService: PlsEvaluationService;
  toolRegistry: ToolRegistry;
  logProvider: ILogProvider;
}

export function createContainer(deps: {
  glossarySourceRepo: IGlossarySourceRepository;
  /** null when no analyzer is configured; dependent tools then report SERVICE_UNAVAILABLE. */
  featureProvider: ILinguisticFeatureProvider | null;
  thresholds: ThresholdTable;
  logProvider: ILogProvider;
  wordLimit?: number;
}): Container {
  const glossaryService = new GlossaryService(deps.glossarySourceRepo, deps.logProvider);
  const plsEvaluationService = new PlsEvaluationService(
    deps.featureProvider,
    deps.thresholds,
    deps.logProvider,
    { wordLimit: deps.wordLimit }
  );

  const toolRegistry = new ToolRegistry(deps.logProvider);
  toolRegistry.register(new GlossaryTool(glossaryService, deps.logProvider));
  toolRegistry.register(new GlossaryPresenceTool(glossaryService, deps.logProvider));
  toolRegistry.register(new LinguisticAnalysisTool(plsEvaluationService, deps.logProvider));
  toolRegistry.register(new PlsEvaluationTool(plsEvaluationService, deps.logProvider));

  return {
    glossaryService,
    plsEvaluationService,
    toolRegistry,
    logProvider: deps.logProvider,
  };
}
