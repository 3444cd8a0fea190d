import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { LEVEL_POLICY, FATAL_ERROR_KINDS } from '../engines/index.js';
import type { Services } from '../services/index.js';
import {
  FieldTypeSchema,
  FormatTagSchema,
  RequestedLevelSchema,
  type StructuralErrorKind,
} from '../types/index.js';

export const capabilitiesTool: Tool = {
  name: 'outputcheck_capabilities',
  description: `Describe what outputcheck_validate understands: field types, formats,
constraints, validation levels, error kinds, and an example request.

Call this first when building a schema by hand.`,

  inputSchema: {
    type: 'object',
    properties: {},
  },
};

const CONSTRAINTS: Record<string, string> = {
  required: 'Field must be present (default false)',
  min_length: 'Minimum length; string code points or array items (inclusive)',
  max_length: 'Maximum length; string code points or array items (inclusive)',
  min: 'Inclusive lower bound for number/integer',
  max: 'Inclusive upper bound for number/integer',
  gt: 'Exclusive lower bound for number/integer',
  lt: 'Exclusive upper bound for number/integer',
  pattern: 'Regular expression the whole string must match',
  format: 'email, date (YYYY-MM-DD) or name (fake-name heuristic)',
  enum: 'List of allowed values',
  items: 'Field spec applied to every array element',
  properties: 'Nested schema for an object field',
};

const ERROR_KINDS: Record<StructuralErrorKind, string> = {
  schema_error: 'The schema itself is invalid or could not be found',
  missing_field: 'A required field is absent',
  type_mismatch: 'Value has the wrong type (or is null on a required field)',
  invalid_email: 'Value is not an email address',
  invalid_date: 'Value is not a YYYY-MM-DD calendar date',
  pattern_mismatch: 'Value does not fully match the pattern',
  out_of_range: 'Number is outside min/max/gt/lt',
  not_in_enum: 'Value is not one of the allowed values',
  length_violation: 'String or array is too short or too long',
  invalid_name: 'Value does not look like a real person name',
  unexpected_field: 'Field is not declared in the schema (strictFields only)',
};

export interface CapabilitiesResult {
  fieldTypes: string[];
  formats: string[];
  constraints: Record<string, string>;
  validationLevels: Array<{
    level: string;
    acceptanceThreshold: number | null;
    assessesWithNonFatalErrors: boolean;
  }>;
  errorKinds: Record<StructuralErrorKind, string>;
  fatalErrorKinds: StructuralErrorKind[];
  nameFieldAliases: string[];
  semantic: {
    enabled: boolean;
    service: string | null;
    available: boolean;
    timeoutMs: number;
  };
  exampleRequest: Record<string, unknown>;
}

export function handleCapabilities(
  _args: Record<string, unknown>,
  services: Pick<Services, 'config' | 'semanticService'>
): CapabilitiesResult {
  const { config, semanticService } = services;

  return {
    fieldTypes: [...FieldTypeSchema.options],
    formats: [...FormatTagSchema.options],
    constraints: CONSTRAINTS,
    validationLevels: RequestedLevelSchema.options.map((level) =>
      level === 'structure_only'
        ? { level, acceptanceThreshold: null, assessesWithNonFatalErrors: false }
        : {
            level,
            acceptanceThreshold: LEVEL_POLICY[level].threshold,
            assessesWithNonFatalErrors: LEVEL_POLICY[level].assessWithNonFatalErrors,
          }
    ),
    errorKinds: ERROR_KINDS,
    fatalErrorKinds: [...FATAL_ERROR_KINDS],
    nameFieldAliases: config.nameFieldAliases,
    semantic: {
      enabled: config.semanticEnabled,
      service: semanticService?.name ?? null,
      available: semanticService?.isAvailable() ?? false,
      timeoutMs: config.semanticTimeoutMs,
    },
    exampleRequest: {
      content: {
        customer_name: 'Ada Lovelace',
        email: 'ada@example.com',
        signup_date: '2023-10-15',
        orders: [{ sku: 'AB-1001', quantity: 2 }],
      },
      schema: {
        customer_name: { type: 'string', required: true, min_length: 2 },
        email: { type: 'string', format: 'email', required: true },
        signup_date: { type: 'string', format: 'date' },
        orders: {
          type: 'array',
          items: {
            type: 'object',
            properties: {
              sku: { type: 'string', pattern: '[A-Z]{2}-\\d{4}', required: true },
              quantity: { type: 'integer', min: 1, required: true },
            },
          },
        },
      },
      validationLevel: 'standard',
    },
  };
}
