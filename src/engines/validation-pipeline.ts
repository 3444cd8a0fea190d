/**
 * Validation Pipeline
 *
 * compile -> structural -> (optional) semantic -> merged report.
 *
 * A schema that fails to compile never reaches the payload: the report
 * carries a single schema_error and the semantic pass is skipped.
 */

import type {
  FieldError,
  PathSegment,
  RequestedLevel,
  SemanticResult,
  StructuralResult,
  UnknownFieldPolicy,
  ValidationReport,
} from '../types/index.js';
import { isRecord } from '../utils/guards.js';
import { logger } from '../utils/logger.js';
import { safeCompileSchema, type CompileOptions, type CompiledSchema } from './schema-compiler.js';
import { shouldAssess, type SemanticValidator } from './semantic-validator.js';
import { validateStructure } from './structural-validator.js';

export interface PipelineOptions {
  /** Defaults to 'standard'; 'structure_only' skips the semantic pass */
  level?: RequestedLevel | undefined;
  /** Defaults to true */
  semanticEnabled?: boolean | undefined;
  /** Defaults to 'generic' */
  validationType?: string | undefined;
  unknownFields?: UnknownFieldPolicy | undefined;
  signal?: AbortSignal | undefined;
  compileOptions?: CompileOptions | undefined;
}

export interface PipelineDeps {
  /** null disables the semantic pass entirely */
  semantic: SemanticValidator | null;
}

/**
 * A structural result that reports a schema problem instead of data problems
 */
export function schemaErrorResult(
  message: string,
  loc: PathSegment[] = [],
  suggestion = 'Fix the schema description; no content was checked'
): StructuralResult {
  const error: FieldError = { loc, type: 'schema_error', msg: message, suggestion };
  return { isStructurallyValid: false, errors: [error], validatedData: null };
}

export function buildReport(
  structural: StructuralResult,
  semantic: SemanticResult | null,
  meta: { validationType: string; validationLevel: RequestedLevel; startedAt: number }
): ValidationReport {
  return {
    isValid: structural.isStructurallyValid && (semantic === null || semantic.isSemanticallyValid),
    structural,
    semantic,
    validationType: meta.validationType,
    validationLevel: meta.validationLevel,
    processingTimeMs: Date.now() - meta.startedAt,
  };
}

/**
 * Validate a payload against a schema description supplied with the request.
 */
export async function runPipeline(
  payload: unknown,
  description: unknown,
  options: PipelineOptions,
  deps: PipelineDeps
): Promise<ValidationReport> {
  const startedAt = Date.now();
  const compiled = safeCompileSchema(description, options.compileOptions);

  if (!compiled.success) {
    logger.warn('Schema description failed to compile', undefined, {
      issues: compiled.error.issues.length,
    });
    return buildReport(schemaErrorResult(compiled.error.message), null, {
      validationType: options.validationType ?? 'generic',
      validationLevel: options.level ?? 'standard',
      startedAt,
    });
  }

  return runCompiled(payload, compiled.schema, options, deps, startedAt);
}

/**
 * Validate against an already-compiled schema.
 */
export async function runCompiled(
  payload: unknown,
  schema: CompiledSchema,
  options: PipelineOptions,
  deps: PipelineDeps,
  startedAt: number = Date.now()
): Promise<ValidationReport> {
  const validationLevel = options.level ?? 'standard';
  const validationType = options.validationType ?? 'generic';

  const structural = validateStructure(schema, payload, { unknownFields: options.unknownFields });

  let semantic: SemanticResult | null = null;
  if (
    validationLevel !== 'structure_only' &&
    options.semanticEnabled !== false &&
    deps.semantic &&
    isRecord(payload) &&
    shouldAssess(structural, validationLevel)
  ) {
    semantic = await deps.semantic.assess({
      payload,
      schema: schema.description,
      structural,
      level: validationLevel,
      validationType,
      signal: options.signal,
    });
  }

  const report = buildReport(structural, semantic, { validationType, validationLevel, startedAt });

  logger.debug('Validation finished', undefined, {
    isValid: report.isValid,
    structuralErrors: structural.errors.length,
    semanticScore: semantic?.semanticScore,
    degraded: semantic?.degraded,
    elapsedMs: report.processingTimeMs,
  });

  return report;
}
