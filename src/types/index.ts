/**
 * OutputCheck Type Definitions
 *
 * Central export for all types used across the system.
 */

// Schema description and repository types
export {
  type FieldType,
  type FormatTag,
  type EnumValue,
  type FieldSpecShape,
  type SchemaDescription,
  type ValidationLevel,
  type RequestedLevel,
  type UnknownFieldPolicy,
  type SchemaRecord,
  type SchemaSummary,
  FieldTypeSchema,
  FormatTagSchema,
  EnumValueSchema,
  FieldSpecShapeSchema,
  SchemaDescriptionSchema,
  ValidationLevelSchema,
  RequestedLevelSchema,
  UnknownFieldPolicySchema,
  SchemaRecordSchema,
} from './schema.js';

// Result types
export {
  type StructuralErrorKind,
  type PathSegment,
  type FieldError,
  type StructuralResult,
  type DegradedReason,
  type SemanticResult,
  type ValidationReport,
  type ValidationReportJSON,
  toReportJSON,
} from './report.js';
