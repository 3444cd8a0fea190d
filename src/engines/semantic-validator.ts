/**
 * Semantic Validator
 *
 * Asks a SemanticService to grade content and turns whatever comes back into
 * a SemanticResult. assess() never rejects: a missing service, a blown
 * deadline, caller cancellation, a transport failure or a reply that does not
 * parse all end in a degraded result built from local heuristics.
 *
 * Each call owns its AbortController. The caller's signal is linked into it
 * and a deadline timer aborts it; both are released before assess() returns.
 */

import { z } from 'zod';
import type { SemanticPromptContext } from '../prompts/index.js';
import type {
  DegradedReason,
  SchemaDescription,
  SemanticResult,
  StructuralErrorKind,
  StructuralResult,
  ValidationLevel,
} from '../types/index.js';
import { logger } from '../utils/logger.js';
import { measureLength } from './format-checkers.js';
import { LLMError, LLMErrorCode } from './llm-client.js';
import type { SemanticService } from './semantic-service.js';

export const DEFAULT_SEMANTIC_TIMEOUT_MS = 10_000;

export interface LevelPolicy {
  /** Minimum score for a semantically valid verdict */
  threshold: number;
  /** Whether content with only non-fatal structural errors is still graded */
  assessWithNonFatalErrors: boolean;
}

export const LEVEL_POLICY: Record<ValidationLevel, LevelPolicy> = {
  basic: { threshold: 0.5, assessWithNonFatalErrors: false },
  standard: { threshold: 0.7, assessWithNonFatalErrors: false },
  strict: { threshold: 0.85, assessWithNonFatalErrors: true },
};

/**
 * Errors that leave the payload too broken to grade
 */
export const FATAL_ERROR_KINDS: ReadonlySet<StructuralErrorKind> = new Set<StructuralErrorKind>([
  'schema_error',
  'missing_field',
  'type_mismatch',
]);

export function shouldAssess(structural: StructuralResult, level: ValidationLevel): boolean {
  if (structural.isStructurallyValid) {
    return true;
  }
  return (
    LEVEL_POLICY[level].assessWithNonFatalErrors &&
    structural.errors.every((error) => !FATAL_ERROR_KINDS.has(error.type))
  );
}

export interface SemanticAssessment {
  payload: Record<string, unknown>;
  schema: SchemaDescription;
  structural: StructuralResult;
  level: ValidationLevel;
  validationType: string;
  signal?: AbortSignal | undefined;
}

export interface SemanticValidatorOptions {
  service: SemanticService;
  timeoutMs?: number | undefined;
}

const stringList = z
  .array(z.unknown())
  .catch([])
  .transform((items) => items.filter((item): item is string => typeof item === 'string'));

const ServiceResponseSchema = z.object({
  is_semantically_valid: z.boolean().optional(),
  semantic_score: z.number().finite(),
  issues: stringList.optional().transform((items) => items ?? []),
  suggestions: stringList.optional().transform((items) => items ?? []),
});

const MIN_TEXT_LENGTH: Record<string, { field: string; min: number; issue: string; suggestion: string }> = {
  recommendation: {
    field: 'recommendation_text',
    min: 20,
    issue: 'Recommendation text is too short',
    suggestion: 'Provide more detailed recommendations (at least 20 characters)',
  },
  summary: {
    field: 'summary',
    min: 30,
    issue: 'Summary is too short',
    suggestion: 'Provide a more comprehensive summary (at least 30 characters)',
  },
};

/**
 * Content checks that need no external service
 */
export function localContentChecks(
  payload: Record<string, unknown>,
  validationType: string
): { issues: string[]; suggestions: string[] } {
  const issues: string[] = [];
  const suggestions: string[] = [];

  for (const [field, value] of Object.entries(payload)) {
    if (typeof value === 'string' && value.trim() === '') {
      issues.push(`Field '${field}' is empty`);
      suggestions.push(`Provide meaningful content for '${field}'`);
    }
  }

  const rule = MIN_TEXT_LENGTH[validationType];
  const text = rule ? payload[rule.field] : undefined;
  if (rule && typeof text === 'string' && measureLength(text) < rule.min) {
    issues.push(rule.issue);
    suggestions.push(rule.suggestion);
  }

  return { issues, suggestions };
}

function clampScore(score: number): number {
  return Math.min(1, Math.max(0, score));
}

function classifyFailure(error: unknown): DegradedReason {
  if (error instanceof LLMError) {
    switch (error.code) {
      case LLMErrorCode.NO_API_KEY:
      case LLMErrorCode.CONFIGURATION_ERROR:
        return 'unavailable';
      case LLMErrorCode.INVALID_RESPONSE:
        return 'malformed_response';
      case LLMErrorCode.ABORTED:
        return 'aborted';
      default:
        return 'transport_error';
    }
  }
  // Unparseable reply body (extractJsonObject, Response.json)
  if (error instanceof SyntaxError) {
    return 'malformed_response';
  }
  return 'transport_error';
}

/**
 * Settle with `work`, or reject as soon as `signal` aborts, whichever is first
 */
function untilAborted<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    void work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

export class SemanticValidator {
  private readonly service: SemanticService;
  private readonly timeoutMs: number;

  constructor(options: SemanticValidatorOptions) {
    this.service = options.service;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_SEMANTIC_TIMEOUT_MS;
  }

  get serviceName(): string {
    return this.service.name;
  }

  isServiceAvailable(): boolean {
    return this.service.isAvailable();
  }

  async assess(input: SemanticAssessment): Promise<SemanticResult> {
    try {
      return await this.assessOrThrow(input);
    } catch (error) {
      logger.error('Semantic assessment failed unexpectedly', error);
      return this.fallback(input, 'internal_error');
    }
  }

  private async assessOrThrow(input: SemanticAssessment): Promise<SemanticResult> {
    if (Object.keys(input.payload).length === 0) {
      return {
        isSemanticallyValid: false,
        semanticScore: 0,
        issues: ['The provided data is empty'],
        suggestions: ['Provide content to validate'],
        degraded: false,
      };
    }

    if (Object.keys(input.schema).length === 0) {
      return {
        isSemanticallyValid: false,
        semanticScore: 0,
        issues: ['The provided schema is empty'],
        suggestions: ['Declare at least one field in the schema'],
        degraded: false,
      };
    }

    if (!this.service.isAvailable()) {
      logger.debug('No semantic service available, using local checks');
      return this.fallback(input, 'unavailable');
    }

    if (input.signal?.aborted) {
      return this.fallback(input, 'aborted');
    }

    const context: SemanticPromptContext = {
      validationType: input.validationType,
      validationLevel: input.level,
      payload: input.payload,
      schema: input.schema,
      structuralErrors: input.structural.errors,
    };

    const controller = new AbortController();
    const callerSignal = input.signal;
    const onCallerAbort = (): void => controller.abort(callerSignal?.reason);
    let timedOut = false;

    callerSignal?.addEventListener('abort', onCallerAbort, { once: true });
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort(new Error(`Semantic service exceeded ${this.timeoutMs}ms`));
    }, this.timeoutMs);

    let raw: unknown;
    try {
      raw = await untilAborted(this.service.assess(context, controller.signal), controller.signal);
    } catch (error) {
      const reason: DegradedReason = timedOut
        ? 'timeout'
        : callerSignal?.aborted
          ? 'aborted'
          : classifyFailure(error);
      logger.warn('Semantic service call failed', error, {
        service: this.service.name,
        reason,
        timeoutMs: this.timeoutMs,
      });
      return this.fallback(input, reason);
    } finally {
      clearTimeout(timer);
      callerSignal?.removeEventListener('abort', onCallerAbort);
    }

    return this.interpret(raw, input);
  }

  private interpret(raw: unknown, input: SemanticAssessment): SemanticResult {
    const parsed = ServiceResponseSchema.safeParse(raw);
    if (!parsed.success) {
      logger.warn('Semantic service returned a malformed response', undefined, {
        service: this.service.name,
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
      return this.fallback(input, 'malformed_response');
    }

    const semanticScore = clampScore(parsed.data.semantic_score);
    const { threshold } = LEVEL_POLICY[input.level];
    const isSemanticallyValid =
      semanticScore >= threshold && parsed.data.is_semantically_valid !== false;

    logger.debug('Semantic assessment completed', undefined, {
      service: this.service.name,
      semanticScore,
      threshold,
    });

    return {
      isSemanticallyValid,
      semanticScore,
      issues: parsed.data.issues,
      suggestions: parsed.data.suggestions,
      degraded: false,
    };
  }

  private fallback(input: SemanticAssessment, reason: DegradedReason): SemanticResult {
    const local = localContentChecks(input.payload, input.validationType);
    const suggestions = [...local.suggestions];
    if (reason === 'unavailable') {
      suggestions.push(
        'Set ANTHROPIC_API_KEY or OUTPUTCHECK_SEMANTIC_URL to enable semantic validation'
      );
    }

    return {
      isSemanticallyValid: input.structural.isStructurallyValid && local.issues.length === 0,
      semanticScore: 0.5,
      issues: [
        `Semantic validation unavailable (${reason}); result is based on structural checks only`,
        ...local.issues,
      ],
      suggestions,
      degraded: true,
      degradedReason: reason,
    };
  }
}
