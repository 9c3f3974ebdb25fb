export { ToolRegistry } from './ToolRegistry.js';
export { GlossaryTool, GlossaryPresenceTool } from './GlossaryTool.js';
export { LinguisticAnalysisTool } from './LinguisticAnalysisTool.js';
export type { LinguisticAnalysisResult, TextAnalysis } from './LinguisticAnalysisTool.js';
export { PlsEvaluationTool } from './PlsEvaluationTool.js';
export type { PlsEvaluationResult } from './PlsEvaluationTool.js';
export { runTool } from './run-tool.js';
export { validateParameters } from './validate-parameters.js';
