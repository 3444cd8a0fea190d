/**
 * Engines Index
 *
 * Exports the validation engine modules.
 */

export {
  checkDate,
  checkEmail,
  checkEnum,
  checkLength,
  checkPattern,
  checkRange,
  suggestIsoDate,
  type CheckFailure,
  type CheckOutcome,
} from './format-checkers.js';

export {
  checkName,
  DEFAULT_NAME_HEURISTIC_OPTIONS,
  type NameHeuristicOptions,
  type NameRejectionReason,
} from './name-heuristic.js';

export {
  compileSchema,
  safeCompileSchema,
  DEFAULT_NAME_FIELD_ALIASES,
  type CompiledSchema,
  type CompiledField,
  type CompiledNode,
  type CompileOptions,
} from './schema-compiler.js';

export { validateStructure, formatLoc, type StructuralOptions } from './structural-validator.js';

export {
  LLMClient,
  createClient,
  LLMError,
  LLMErrorCode,
  type LLMClientConfig,
  type LLMResponse,
  type GenerateOptions,
} from './llm-client.js';

export {
  LLMSemanticService,
  HttpSemanticService,
  UnavailableSemanticService,
  type SemanticService,
} from './semantic-service.js';

export {
  SemanticValidator,
  shouldAssess,
  LEVEL_POLICY,
  FATAL_ERROR_KINDS,
  DEFAULT_SEMANTIC_TIMEOUT_MS,
  type SemanticAssessment,
} from './semantic-validator.js';

export { runPipeline, runCompiled, type PipelineOptions, type PipelineDeps } from './validation-pipeline.js';

export { ContentValidator, type ValidateRequest, type ContentValidatorOptions } from './content-validator.js';
