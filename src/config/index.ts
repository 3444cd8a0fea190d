/**
 * Configuration
 *
 * Resolution order, later wins:
 * 1. Built-in defaults
 * 2. outputcheck.config.json in the working directory
 * 3. Environment variables (ANTHROPIC_API_KEY, OUTPUTCHECK_*)
 *
 * An unreadable or invalid config file is logged and ignored.
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { DEFAULT_MODEL } from '../engines/llm-client.js';
import {
  DEFAULT_NAME_HEURISTIC_OPTIONS,
  type NameHeuristicOptions,
} from '../engines/name-heuristic.js';
import { DEFAULT_NAME_FIELD_ALIASES } from '../engines/schema-compiler.js';
import { DEFAULT_SEMANTIC_TIMEOUT_MS } from '../engines/semantic-validator.js';
import { logger } from '../utils/logger.js';

export const CONFIG_FILE_NAME = 'outputcheck.config.json';

export interface OutputCheckConfig {
  anthropicApiKey: string | null;
  model: string;
  /** External content-quality endpoint; takes precedence over the model */
  semanticUrl: string | null;
  semanticTimeoutMs: number;
  semanticEnabled: boolean;
  /** Reject undeclared payload fields by default */
  strictFields: boolean;
  schemaDir: string;
  nameFieldAliases: string[];
  nameHeuristic: NameHeuristicOptions;
}

const ConfigFileSchema = z
  .object({
    anthropicApiKey: z.string().min(1).optional(),
    model: z.string().min(1).optional(),
    semanticUrl: z.string().url().optional(),
    semanticTimeoutMs: z.number().int().positive().optional(),
    semanticEnabled: z.boolean().optional(),
    strictFields: z.boolean().optional(),
    schemaDir: z.string().min(1).optional(),
    nameFieldAliases: z.array(z.string().min(1)).optional(),
    nameHeuristic: z
      .object({
        minLength: z.number().int().nonnegative(),
        minDistinctRatio: z.number().min(0).max(1),
        keyboardRunLength: z.number().int().positive(),
        keyboardCoverage: z.number().min(0).max(1),
        maxRepeatRun: z.number().int().positive(),
        keyboardSequences: z.array(z.string().min(1)),
      })
      .partial()
      .optional(),
  })
  .strict();

type ConfigFile = z.infer<typeof ConfigFileSchema>;

/**
 * Directory of the schema records shipped with the package: the `schemas`
 * folder next to the nearest package.json above this module.
 */
export function builtinSchemaDir(): string {
  let dir = dirname(fileURLToPath(import.meta.url));
  for (;;) {
    if (existsSync(join(dir, 'package.json'))) {
      return join(dir, 'schemas');
    }
    const parent = dirname(dir);
    if (parent === dir) {
      return resolve('schemas');
    }
    dir = parent;
  }
}

function readConfigFile(cwd: string): ConfigFile {
  const configPath = resolve(cwd, CONFIG_FILE_NAME);
  if (!existsSync(configPath)) {
    return {};
  }

  let parsedJson: unknown;
  try {
    parsedJson = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (error) {
    logger.warn('Config file could not be read, ignoring it', error, { configPath });
    return {};
  }

  const result = ConfigFileSchema.safeParse(parsedJson);
  if (!result.success) {
    logger.warn('Config file has invalid structure, ignoring it', undefined, {
      configPath,
      issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
    return {};
  }

  return result.data;
}

function parseBooleanEnv(name: string, raw: string | undefined): boolean | undefined {
  if (raw === undefined || raw === '') return undefined;
  const value = raw.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(value)) return true;
  if (['0', 'false', 'no', 'off'].includes(value)) return false;
  logger.warn('Ignoring unrecognised boolean environment variable', undefined, { name, value: raw });
  return undefined;
}

function parsePositiveIntEnv(name: string, raw: string | undefined): number | undefined {
  if (raw === undefined || raw === '') return undefined;
  const value = Number(raw);
  if (Number.isInteger(value) && value > 0) return value;
  logger.warn('Ignoring invalid numeric environment variable', undefined, { name, value: raw });
  return undefined;
}

export interface LoadConfigOptions {
  cwd?: string | undefined;
  env?: NodeJS.ProcessEnv | undefined;
}

export function loadConfig(options: LoadConfigOptions = {}): OutputCheckConfig {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const file = readConfigFile(cwd);

  const fileSchemaDir = file.schemaDir ? resolve(cwd, file.schemaDir) : undefined;
  const envSchemaDir = env['OUTPUTCHECK_SCHEMA_DIR'] ? resolve(cwd, env['OUTPUTCHECK_SCHEMA_DIR']) : undefined;

  return {
    anthropicApiKey: env['ANTHROPIC_API_KEY'] || file.anthropicApiKey || null,
    model: env['OUTPUTCHECK_MODEL'] || file.model || DEFAULT_MODEL,
    semanticUrl: env['OUTPUTCHECK_SEMANTIC_URL'] || file.semanticUrl || null,
    semanticTimeoutMs:
      parsePositiveIntEnv('OUTPUTCHECK_SEMANTIC_TIMEOUT_MS', env['OUTPUTCHECK_SEMANTIC_TIMEOUT_MS']) ??
      file.semanticTimeoutMs ??
      DEFAULT_SEMANTIC_TIMEOUT_MS,
    semanticEnabled:
      parseBooleanEnv('OUTPUTCHECK_SEMANTIC_ENABLED', env['OUTPUTCHECK_SEMANTIC_ENABLED']) ??
      file.semanticEnabled ??
      true,
    strictFields:
      parseBooleanEnv('OUTPUTCHECK_STRICT_FIELDS', env['OUTPUTCHECK_STRICT_FIELDS']) ??
      file.strictFields ??
      false,
    schemaDir: envSchemaDir ?? fileSchemaDir ?? builtinSchemaDir(),
    nameFieldAliases: file.nameFieldAliases ?? [...DEFAULT_NAME_FIELD_ALIASES],
    nameHeuristic: mergeNameHeuristic(file.nameHeuristic),
  };
}

function mergeNameHeuristic(
  overrides: Partial<NameHeuristicOptions> | undefined
): NameHeuristicOptions {
  const defaults = DEFAULT_NAME_HEURISTIC_OPTIONS;
  return {
    minLength: overrides?.minLength ?? defaults.minLength,
    minDistinctRatio: overrides?.minDistinctRatio ?? defaults.minDistinctRatio,
    keyboardRunLength: overrides?.keyboardRunLength ?? defaults.keyboardRunLength,
    keyboardCoverage: overrides?.keyboardCoverage ?? defaults.keyboardCoverage,
    maxRepeatRun: overrides?.maxRepeatRun ?? defaults.maxRepeatRun,
    keyboardSequences: overrides?.keyboardSequences ?? defaults.keyboardSequences,
  };
}
