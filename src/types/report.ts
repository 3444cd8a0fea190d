/**
 * Validation result types and their wire (snake_case) form.
 */

import type { RequestedLevel } from './schema.js';

/**
 * Kinds of structural violation
 */
export type StructuralErrorKind =
  | 'schema_error'
  | 'missing_field'
  | 'type_mismatch'
  | 'invalid_email'
  | 'invalid_date'
  | 'pattern_mismatch'
  | 'out_of_range'
  | 'not_in_enum'
  | 'length_violation'
  | 'invalid_name'
  | 'unexpected_field';

/**
 * Path segment: an object key or an array index
 */
export type PathSegment = string | number;

/**
 * One violated constraint, located in the payload
 */
export interface FieldError {
  /** Keys and indices from the payload root to the offending node */
  loc: PathSegment[];
  type: StructuralErrorKind;
  msg: string;
  suggestion: string;
  ctx?: Record<string, string> | undefined;
}

export interface StructuralResult {
  isStructurallyValid: boolean;
  /** In schema declaration order */
  errors: FieldError[];
  /** Payload restricted to declared fields; null unless valid */
  validatedData: Record<string, unknown> | null;
}

/**
 * Why a semantic result came from the local fallback
 */
export type DegradedReason =
  | 'unavailable'
  | 'timeout'
  | 'aborted'
  | 'transport_error'
  | 'malformed_response'
  | 'internal_error';

export interface SemanticResult {
  isSemanticallyValid: boolean;
  /** Always within [0, 1] */
  semanticScore: number;
  issues: string[];
  suggestions: string[];
  degraded: boolean;
  degradedReason?: DegradedReason | undefined;
}

export interface ValidationReport {
  isValid: boolean;
  structural: StructuralResult;
  /** null when the semantic pass was not attempted */
  semantic: SemanticResult | null;
  validationType: string;
  validationLevel: RequestedLevel;
  processingTimeMs: number;
}

/**
 * Client-facing JSON shape of a report
 */
export interface ValidationReportJSON {
  is_valid: boolean;
  structural_validation: {
    is_structurally_valid: boolean;
    errors: FieldError[];
    validated_data: Record<string, unknown> | null;
  };
  semantic_validation: {
    is_semantically_valid: boolean;
    semantic_score: number;
    issues: string[];
    suggestions: string[];
    degraded: boolean;
    degraded_reason: DegradedReason | null;
  } | null;
  validation_type: string;
  validation_level: RequestedLevel;
  processing_time_ms: number;
}

export function toReportJSON(report: ValidationReport): ValidationReportJSON {
  const { structural, semantic } = report;
  return {
    is_valid: report.isValid,
    structural_validation: {
      is_structurally_valid: structural.isStructurallyValid,
      errors: structural.errors,
      validated_data: structural.validatedData,
    },
    semantic_validation: semantic
      ? {
          is_semantically_valid: semantic.isSemanticallyValid,
          semantic_score: semantic.semanticScore,
          issues: semantic.issues,
          suggestions: semantic.suggestions,
          degraded: semantic.degraded,
          degraded_reason: semantic.degradedReason ?? null,
        }
      : null,
    validation_type: report.validationType,
    validation_level: report.validationLevel,
    processing_time_ms: report.processingTimeMs,
  };
}
