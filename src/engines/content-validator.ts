/**
 * Content Validator
 *
 * Engine entry point. Resolves the schema (inline, or by name from the
 * repository), compiles named schemas once per name and version, and runs the
 * pipeline. Every outcome, including an unknown schema name, comes back as a
 * ValidationReport.
 */

import type {
  RequestedLevel,
  SchemaDescription,
  SchemaRecord,
  ValidationReport,
} from '../types/index.js';
import type { SchemaRepository } from '../repository/index.js';
import { logger } from '../utils/logger.js';
import { safeCompileSchema, type CompileOptions, type CompiledSchema } from './schema-compiler.js';
import type { SemanticValidator } from './semantic-validator.js';
import {
  buildReport,
  runCompiled,
  runPipeline,
  schemaErrorResult,
  type PipelineOptions,
} from './validation-pipeline.js';

export interface ValidateRequest {
  content: unknown;
  /** Inline schema description; mutually exclusive with schemaName */
  schema?: SchemaDescription | undefined;
  schemaName?: string | undefined;
  /** Latest when omitted */
  schemaVersion?: string | undefined;
  validationType?: string | undefined;
  validationLevel?: RequestedLevel | undefined;
  /** Reject fields the schema does not declare */
  strictFields?: boolean | undefined;
  /** false skips the semantic pass for this request */
  semantic?: boolean | undefined;
  signal?: AbortSignal | undefined;
}

export interface ContentValidatorOptions {
  repository: SchemaRepository;
  semantic: SemanticValidator | null;
  compileOptions?: CompileOptions | undefined;
  strictFieldsByDefault?: boolean | undefined;
  /** Global switch; a request cannot turn the semantic pass back on */
  semanticEnabled?: boolean | undefined;
}

export class ContentValidator {
  private readonly compiled = new Map<string, CompiledSchema>();
  private readonly repository: SchemaRepository;
  private readonly semantic: SemanticValidator | null;
  private readonly compileOptions: CompileOptions | undefined;
  private readonly strictFieldsByDefault: boolean;
  private readonly semanticEnabled: boolean;

  constructor(options: ContentValidatorOptions) {
    this.repository = options.repository;
    this.semantic = options.semantic;
    this.compileOptions = options.compileOptions;
    this.strictFieldsByDefault = options.strictFieldsByDefault ?? false;
    this.semanticEnabled = options.semanticEnabled ?? true;
  }

  /** Number of named schemas compiled so far */
  get cachedSchemaCount(): number {
    return this.compiled.size;
  }

  async validate(request: ValidateRequest): Promise<ValidationReport> {
    const startedAt = Date.now();
    const deps = { semantic: this.semantic };
    const options: PipelineOptions = {
      semanticEnabled: this.semanticEnabled && request.semantic !== false,
      unknownFields: (request.strictFields ?? this.strictFieldsByDefault) ? 'reject' : 'ignore',
      signal: request.signal,
      compileOptions: this.compileOptions,
    };

    if (request.schema !== undefined && request.schemaName !== undefined) {
      return this.schemaProblem(
        'Provide either an inline schema or a schemaName, not both',
        request,
        startedAt
      );
    }

    if (request.schema !== undefined) {
      return runPipeline(
        request.content,
        request.schema,
        {
          ...options,
          level: request.validationLevel ?? 'standard',
          validationType: request.validationType ?? 'generic',
        },
        deps
      );
    }

    if (request.schemaName === undefined) {
      return this.schemaProblem('Provide an inline schema or a schemaName', request, startedAt);
    }

    let record: SchemaRecord | null;
    try {
      record = await this.repository.getSchema(request.schemaName, request.schemaVersion);
    } catch (error) {
      logger.error('Schema repository lookup failed', error, { schema: request.schemaName });
      const reason = error instanceof Error ? error.message : String(error);
      return this.schemaProblem(`Schema repository unavailable: ${reason}`, request, startedAt);
    }
    if (!record) {
      const label = request.schemaVersion
        ? `${request.schemaName}@${request.schemaVersion}`
        : request.schemaName;
      logger.info('Requested schema not found', { schema: label });
      return this.schemaProblem(`Schema not found: ${label}`, request, startedAt);
    }

    const validationType = request.validationType ?? record.name;
    logger.updateContext({ schemaName: record.name, validationType });

    const key = `${record.name}@${record.version}`;
    let schema = this.compiled.get(key);
    if (!schema) {
      const result = safeCompileSchema(record.schema, this.compileOptions);
      if (!result.success) {
        logger.error('Stored schema failed to compile', result.error, { schema: key });
        return buildReport(schemaErrorResult(result.error.message), null, {
          validationType,
          validationLevel: request.validationLevel ?? record.validation_level,
          startedAt,
        });
      }
      schema = result.schema;
      this.compiled.set(key, schema);
      logger.debug('Compiled stored schema', undefined, { schema: key });
    }

    return runCompiled(
      request.content,
      schema,
      {
        ...options,
        level: request.validationLevel ?? record.validation_level,
        validationType,
      },
      deps,
      startedAt
    );
  }

  private schemaProblem(message: string, request: ValidateRequest, startedAt: number): ValidationReport {
    return buildReport(
      schemaErrorResult(message, ['schema'], 'Use outputcheck_schemas to list the available schemas'),
      null,
      {
        validationType: request.validationType ?? request.schemaName ?? 'generic',
        validationLevel: request.validationLevel ?? 'standard',
        startedAt,
      }
    );
  }
}
