export * from './types.js';
export { AssignmentError, ConfigurationError, ValidationError, asErrorMessage } from './errors.js';
export { EvalRubric, type EvalRubricOptions } from './rubric.js';
export {
  EvalCase,
  evaluate,
  failedEvaluation,
  DEFAULT_WEIGHT_POLICY,
  type EvalCaseOptions,
  type WeightPolicy,
} from './case.js';
export {
  EvalSuite,
  summarizeRun,
  type CaseReport,
  type EvalSuiteOptions,
  type ExtendCaseOptions,
  type ModelRun,
  type RunOptions,
  type RunSummary,
  type SuiteReport,
} from './suite.js';
