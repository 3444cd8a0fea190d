import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { SERVER_VERSION } from '../constants.js';
import type { Services } from '../services/index.js';

/**
 * Tool definition for health check
 */
export const healthTool: Tool = {
  name: 'outputcheck_health',
  description: `Check the health status of the OutputCheck server.

Returns:
- Overall health status (healthy, degraded, unhealthy)
- Schema repository status
- Semantic service status (a missing service degrades, it does not fail)
- Version information`,

  inputSchema: {
    type: 'object',
    properties: {
      verbose: {
        type: 'boolean',
        description: 'Include the schema names found in the repository',
        default: false,
      },
    },
  },
};

/**
 * Health status levels
 */
export type HealthStatus = 'healthy' | 'degraded' | 'unhealthy';

interface CheckResult {
  status: HealthStatus;
  message: string;
  latencyMs?: number;
}

export interface HealthResult {
  status: HealthStatus;
  timestamp: string;
  version: string;
  checks: {
    repository: CheckResult & { schemaCount?: number };
    semantic: CheckResult & { service: string | null };
  };
  schemas?: string[];
}

export async function handleHealth(
  args: Record<string, unknown>,
  services: Pick<Services, 'config' | 'repository' | 'semanticService'>
): Promise<HealthResult> {
  const verbose = args['verbose'] === true;
  const timestamp = new Date().toISOString();

  const { check: repository, names } = await checkRepository(services);
  const semantic = checkSemantic(services);

  let overallStatus: HealthStatus = 'healthy';
  if (repository.status === 'unhealthy') {
    overallStatus = 'unhealthy';
  } else if (repository.status === 'degraded' || semantic.status === 'degraded') {
    overallStatus = 'degraded';
  }

  const result: HealthResult = {
    status: overallStatus,
    timestamp,
    version: SERVER_VERSION,
    checks: { repository, semantic },
  };

  if (verbose && names) {
    result.schemas = names;
  }

  return result;
}

async function checkRepository(
  services: Pick<Services, 'config' | 'repository'>
): Promise<{ check: HealthResult['checks']['repository']; names: string[] | null }> {
  const start = Date.now();

  try {
    const schemas = await services.repository.listSchemas();
    const latencyMs = Date.now() - start;

    if (schemas.length === 0) {
      return {
        check: {
          status: 'degraded',
          message: `No schemas found in ${services.config.schemaDir}; only inline schemas can be used`,
          latencyMs,
          schemaCount: 0,
        },
        names: [],
      };
    }

    return {
      check: {
        status: 'healthy',
        message: 'Schema repository is operational',
        latencyMs,
        schemaCount: schemas.length,
      },
      names: schemas.map((schema) => schema.name),
    };
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown repository error';
    return {
      check: { status: 'unhealthy', message: `Repository error: ${message}` },
      names: null,
    };
  }
}

function checkSemantic(
  services: Pick<Services, 'config' | 'semanticService'>
): HealthResult['checks']['semantic'] {
  const service = services.semanticService;

  if (!services.config.semanticEnabled || !service) {
    return { status: 'healthy', message: 'Semantic validation is disabled', service: null };
  }

  if (!service.isAvailable()) {
    return {
      status: 'degraded',
      message: 'No semantic service configured; semantic results fall back to local checks',
      service: service.name,
    };
  }

  return { status: 'healthy', message: 'Semantic service is configured', service: service.name };
}
