import { z } from 'zod';

/**
 * Declared value types a field spec can carry
 */
export const FieldTypeSchema = z.enum([
  'string',
  'number',
  'integer',
  'boolean',
  'array',
  'object',
]);

export type FieldType = z.infer<typeof FieldTypeSchema>;

/**
 * Named string formats understood by the format checkers
 */
export const FormatTagSchema = z.enum(['email', 'date', 'name']);

export type FormatTag = z.infer<typeof FormatTagSchema>;

export const EnumValueSchema = z.union([z.string(), z.number(), z.boolean()]);

export type EnumValue = z.infer<typeof EnumValueSchema>;

/**
 * Shape of one field spec inside a schema description.
 *
 * `items` and `properties` are left as unknown here; the compiler walks them
 * itself so issues can be reported against their full schema path.
 */
export const FieldSpecShapeSchema = z.object({
  type: FieldTypeSchema,
  required: z.boolean().optional(),
  description: z.string().optional(),
  min_length: z.number().int().nonnegative().optional(),
  max_length: z.number().int().nonnegative().optional(),
  min: z.number().finite().optional(),
  max: z.number().finite().optional(),
  gt: z.number().finite().optional(),
  lt: z.number().finite().optional(),
  pattern: z.string().optional(),
  format: FormatTagSchema.optional(),
  enum: z.array(EnumValueSchema).min(1, 'enum must list at least one value').optional(),
  items: z.unknown().optional(),
  properties: z.unknown().optional(),
}).strict();

export type FieldSpecShape = z.infer<typeof FieldSpecShapeSchema>;

/**
 * A declarative schema description: field name to field spec.
 * Interpreted at request time by the schema compiler.
 */
export type SchemaDescription = Record<string, unknown>;

export const SchemaDescriptionSchema = z.record(z.string(), z.unknown());

/**
 * Semantic strictness levels
 */
export const ValidationLevelSchema = z.enum(['basic', 'standard', 'strict']);

export type ValidationLevel = z.infer<typeof ValidationLevelSchema>;

/**
 * Levels a caller or stored schema may request; `structure_only` turns the
 * semantic pass off.
 */
export const RequestedLevelSchema = z.enum(['structure_only', 'basic', 'standard', 'strict']);

export type RequestedLevel = z.infer<typeof RequestedLevelSchema>;

/**
 * Policy for payload fields that the schema does not declare
 */
export const UnknownFieldPolicySchema = z.enum(['ignore', 'reject']);

export type UnknownFieldPolicy = z.infer<typeof UnknownFieldPolicySchema>;

/**
 * A stored schema as read from the schema repository
 */
export const SchemaRecordSchema = z.object({
  name: z.string().regex(/^[a-z0-9_]{3,}$/, 'Schema name must be at least 3 lowercase letters, digits or underscores'),
  description: z.string(),
  version: z.string().regex(/^\d+(\.\d+)*$/, 'Version must be dotted numbers, e.g. 1.0.0'),
  validation_level: RequestedLevelSchema.default('standard'),
  schema: SchemaDescriptionSchema,
  example: z.record(z.string(), z.unknown()).optional(),
});

export type SchemaRecord = z.infer<typeof SchemaRecordSchema>;

/**
 * Summary entry returned when listing the repository
 */
export interface SchemaSummary {
  name: string;
  description: string;
  currentVersion: string;
  versions: string[];
  validationLevel: RequestedLevel;
}
