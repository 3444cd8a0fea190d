import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { Services } from '../services/index.js';
import {
  RequestedLevelSchema,
  SchemaDescriptionSchema,
  toReportJSON,
  type ValidationReportJSON,
} from '../types/index.js';
import { logger } from '../utils/logger.js';

export const ValidateInputSchema = z
  .object({
    content: z.unknown(),
    schema: SchemaDescriptionSchema.optional(),
    schemaName: z.string().min(1).optional(),
    schemaVersion: z.string().min(1).optional(),
    validationType: z.string().min(1).optional(),
    validationLevel: RequestedLevelSchema.optional(),
    strictFields: z.boolean().optional(),
    semantic: z.boolean().optional(),
  })
  .refine((input) => input.content !== undefined, {
    message: 'content is required',
    path: ['content'],
  })
  .refine((input) => (input.schema === undefined) !== (input.schemaName === undefined), {
    message: 'Provide exactly one of schema or schemaName',
    path: ['schema'],
  });

export type ValidateInput = z.infer<typeof ValidateInputSchema>;

/**
 * Tool definition for content validation
 */
export const validateTool: Tool = {
  name: 'outputcheck_validate',
  description: `Validate structured content (typically model output) against a schema.

Pass the schema inline, or name one from the repository (see outputcheck_schemas).

Structural checks: required fields, types, string/array lengths, numeric bounds,
enums, anchored regex patterns, email and YYYY-MM-DD date formats, nested
objects and arrays, and a heuristic that rejects fake-looking person names.
Every error carries its path (loc), a kind, a message and a suggestion.

Semantic check (levels basic, standard, strict): an advisory content-quality
grade from a model. If the model is not configured or does not answer in time,
the result is marked degraded and falls back to local checks.
Use validationLevel "structure_only" to skip it.

Example:
\`\`\`json
{
  "content": { "customer_name": "Ada Lovelace", "email": "ada@example.com" },
  "schema": {
    "customer_name": { "type": "string", "required": true },
    "email": { "type": "string", "format": "email", "required": true }
  },
  "validationLevel": "structure_only"
}
\`\`\``,

  inputSchema: {
    type: 'object',
    properties: {
      content: {
        type: 'object',
        description: 'The data to validate',
      },
      schema: {
        type: 'object',
        description: 'Inline schema description: field name -> field spec',
      },
      schemaName: {
        type: 'string',
        description: 'Name of a stored schema (instead of an inline schema)',
      },
      schemaVersion: {
        type: 'string',
        description: 'Version of the stored schema (default: latest)',
      },
      validationType: {
        type: 'string',
        description: 'Kind of output, e.g. generic, recommendation, summary, classification',
      },
      validationLevel: {
        type: 'string',
        enum: ['structure_only', 'basic', 'standard', 'strict'],
        description: 'Semantic strictness (default: the stored schema level, else standard)',
      },
      strictFields: {
        type: 'boolean',
        description: 'Report fields the schema does not declare',
      },
      semantic: {
        type: 'boolean',
        description: 'Set false to skip the semantic check',
        default: true,
      },
    },
    required: ['content'],
  },
};

export async function handleValidate(
  args: Record<string, unknown>,
  services: Pick<Services, 'validator'>,
  signal?: AbortSignal
): Promise<ValidationReportJSON> {
  const input = ValidateInputSchema.parse(args);

  logger.updateContext({
    ...(input.schemaName !== undefined && { schemaName: input.schemaName }),
    ...(input.validationType !== undefined && { validationType: input.validationType }),
  });

  const report = await services.validator.validate({
    content: input.content,
    schema: input.schema,
    schemaName: input.schemaName,
    schemaVersion: input.schemaVersion,
    validationType: input.validationType,
    validationLevel: input.validationLevel,
    strictFields: input.strictFields,
    semantic: input.semantic,
    signal,
  });

  logger.info('Validation completed', {
    isValid: report.isValid,
    structuralErrors: report.structural.errors.length,
    semanticScore: report.semantic?.semanticScore,
    degraded: report.semantic?.degraded ?? false,
    processingTimeMs: report.processingTimeMs,
  });

  return toReportJSON(report);
}
