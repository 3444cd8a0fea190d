import type { Tool, TextContent } from '@modelcontextprotocol/sdk/types.js';
import type { Services } from '../services/index.js';
import { isRecord } from '../utils/guards.js';
import { logger } from '../utils/logger.js';
import {
  classifyError,
  createErrorResponse,
  OutputCheckError,
  ErrorCode,
} from '../utils/errors.js';

import { validateTool, handleValidate } from './validate.js';
import { capabilitiesTool, handleCapabilities } from './capabilities.js';
import { schemasTool, handleSchemas } from './schemas.js';
import { healthTool, handleHealth } from './health.js';

/**
 * Register all MCP tools
 *
 * - outputcheck_validate: Validate content against a schema
 * - outputcheck_capabilities: What the validator understands
 * - outputcheck_schemas: Browse stored schemas
 * - outputcheck_health: Health check
 */
export function registerTools(): Tool[] {
  return [validateTool, capabilitiesTool, schemasTool, healthTool];
}

const TOOL_NAMES = registerTools().map((tool) => tool.name);

/**
 * Pull schema name and validation type out of the arguments for request tracking
 */
function extractContextIds(args: Record<string, unknown>): {
  schemaName?: string | undefined;
  validationType?: string | undefined;
} {
  return {
    schemaName: typeof args['schemaName'] === 'string' ? args['schemaName'] : undefined,
    validationType: typeof args['validationType'] === 'string' ? args['validationType'] : undefined,
  };
}

function textResponse(payload: unknown): { content: TextContent[] } {
  return {
    content: [
      {
        type: 'text',
        text: JSON.stringify(payload, null, 2),
      },
    ],
  };
}

/**
 * Handle tool calls with input validation, request tracking, and structured error responses.
 */
export async function handleToolCall(
  name: string,
  args: unknown,
  services: Services,
  signal?: AbortSignal
): Promise<{ content: TextContent[] }> {
  const { schemaName, validationType } = isRecord(args) ? extractContextIds(args) : {};

  return logger.withRequestContext({ toolName: name, schemaName, validationType }, async () => {
    const requestId = logger.getRequestId();

    try {
      if (!isRecord(args)) {
        logger.warn('Invalid arguments received', undefined, {
          argType: typeof args,
          isNull: args === null,
          isArray: Array.isArray(args),
        });
        throw new OutputCheckError('Arguments must be a non-null object', ErrorCode.INVALID_ARGUMENTS, {
          details: { received: Array.isArray(args) ? 'array' : typeof args },
        });
      }

      logger.debug('Tool call started', undefined, { argKeys: Object.keys(args) });

      let result: unknown;

      switch (name) {
        case 'outputcheck_validate':
          result = await handleValidate(args, services, signal);
          break;

        case 'outputcheck_capabilities':
          result = handleCapabilities(args, services);
          break;

        case 'outputcheck_schemas':
          result = await handleSchemas(args, services);
          break;

        case 'outputcheck_health':
          result = await handleHealth(args, services);
          break;

        default:
          logger.warn('Unknown tool requested', undefined, { tool: name });
          throw new OutputCheckError(
            `Unknown tool: ${name}. Available: ${TOOL_NAMES.join(', ')}`,
            ErrorCode.UNKNOWN_TOOL
          );
      }

      logger.debug('Tool call completed', undefined, { elapsedMs: logger.getElapsedMs() });

      return textResponse(result);
    } catch (error) {
      const classified = classifyError(error);

      logger.error('Tool call failed', error, {
        code: classified.code,
        httpStatus: classified.httpStatus,
        isRetryable: classified.isRetryable,
        elapsedMs: logger.getElapsedMs(),
      });

      return textResponse(createErrorResponse(error, requestId));
    }
  });
}
