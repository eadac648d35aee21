export {
  extractFunctions,
  checkComplexity,
  detectIssues,
  suggestImprovements,
  checkQualityScore,
  registerCodeReviewTools,
  DEFAULT_MAX_LINE_LENGTH,
  DEFAULT_COMPLEXITY_THRESHOLD,
} from './tools';
export type { ComplexityScore, Issue, IssueType, Suggestion } from './tools';
export { findFunctions } from './source';
export type { FunctionInfo, FunctionKind } from './source';
export { CODE_REVIEW_GRAPH, EXAMPLE_CODE, EXAMPLE_INITIAL_STATE } from './workflow';
