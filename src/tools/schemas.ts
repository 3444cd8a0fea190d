import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { Services } from '../services/index.js';
import type { SchemaRecord, SchemaSummary } from '../types/index.js';
import { NotFoundError } from '../utils/errors.js';

const SchemasInputSchema = z.discriminatedUnion('action', [
  z.object({ action: z.literal('list') }),
  z.object({
    action: z.literal('get'),
    name: z.string().min(1),
    version: z.string().min(1).optional(),
  }),
]);

/**
 * outputcheck_schemas - browse the schema repository
 */
export const schemasTool: Tool = {
  name: 'outputcheck_schemas',
  description: `Browse stored schemas that outputcheck_validate can use by name.

## Actions
- **list** - Every schema with its versions and default validation level
- **get** - One schema record (latest version unless "version" is given)

## Examples

\`\`\`json
{ "action": "list" }
\`\`\`

\`\`\`json
{ "action": "get", "name": "summary", "version": "1.0.0" }
\`\`\``,

  inputSchema: {
    type: 'object',
    properties: {
      action: {
        type: 'string',
        enum: ['list', 'get'],
        description: 'Action to perform',
      },
      name: {
        type: 'string',
        description: 'Schema name (for get)',
      },
      version: {
        type: 'string',
        description: 'Schema version (for get; default latest)',
      },
    },
    required: ['action'],
  },
};

export type SchemasResult =
  | { schemas: SchemaSummary[]; total: number }
  | { schema: SchemaRecord };

export async function handleSchemas(
  args: Record<string, unknown>,
  services: Pick<Services, 'repository'>
): Promise<SchemasResult> {
  const input = SchemasInputSchema.parse(args);

  if (input.action === 'list') {
    const schemas = await services.repository.listSchemas();
    return { schemas, total: schemas.length };
  }

  const schema = await services.repository.getSchema(input.name, input.version);
  if (!schema) {
    throw new NotFoundError(
      'Schema',
      input.version ? `${input.name}@${input.version}` : input.name
    );
  }
  return { schema };
}
