export { InputAnalyzer, loadAnalysisLexicon } from './input-analysis.service.js';
export type { AnalysisLexicon } from './input-analysis.service.js';
