import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { builtinSchemaDir, CONFIG_FILE_NAME, loadConfig } from '../../src/config/index.js';
import { DEFAULT_MODEL } from '../../src/engines/llm-client.js';
import { DEFAULT_NAME_HEURISTIC_OPTIONS } from '../../src/engines/name-heuristic.js';
import { DEFAULT_NAME_FIELD_ALIASES } from '../../src/engines/schema-compiler.js';

describe('loadConfig', () => {
  let cwd: string;

  const writeConfig = (content: unknown): Promise<void> =>
    writeFile(join(cwd, CONFIG_FILE_NAME), typeof content === 'string' ? content : JSON.stringify(content));

  beforeEach(async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    cwd = await mkdtemp(join(tmpdir(), 'outputcheck-config-'));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(cwd, { recursive: true, force: true });
  });

  it('should fall back to defaults', () => {
    expect(loadConfig({ cwd, env: {} })).toEqual({
      anthropicApiKey: null,
      model: DEFAULT_MODEL,
      semanticUrl: null,
      semanticTimeoutMs: 10_000,
      semanticEnabled: true,
      strictFields: false,
      schemaDir: builtinSchemaDir(),
      nameFieldAliases: [...DEFAULT_NAME_FIELD_ALIASES],
      nameHeuristic: DEFAULT_NAME_HEURISTIC_OPTIONS,
    });
  });

  it('should read the config file', async () => {
    await writeConfig({
      anthropicApiKey: 'test-secret',
      semanticTimeoutMs: 2500,
      strictFields: true,
      schemaDir: 'my-schemas',
      nameFieldAliases: ['author'],
      nameHeuristic: { minLength: 3 },
    });

    const config = loadConfig({ cwd, env: {} });

    expect(config.anthropicApiKey).toBe('test-secret');
    expect(config.semanticTimeoutMs).toBe(2500);
    expect(config.strictFields).toBe(true);
    expect(config.schemaDir).toBe(join(cwd, 'my-schemas'));
    expect(config.nameFieldAliases).toEqual(['author']);
    expect(config.nameHeuristic).toEqual({ ...DEFAULT_NAME_HEURISTIC_OPTIONS, minLength: 3 });
  });

  it('should let the environment override the file', async () => {
    await writeConfig({ model: 'file-model', semanticEnabled: true, semanticTimeoutMs: 2500 });

    const config = loadConfig({
      cwd,
      env: {
        OUTPUTCHECK_MODEL: 'env-model',
        OUTPUTCHECK_SEMANTIC_ENABLED: 'off',
        OUTPUTCHECK_SEMANTIC_TIMEOUT_MS: '750',
        OUTPUTCHECK_SEMANTIC_URL: 'http://semantic.test/assess',
        OUTPUTCHECK_SCHEMA_DIR: 'env-schemas',
      },
    });

    expect(config.model).toBe('env-model');
    expect(config.semanticEnabled).toBe(false);
    expect(config.semanticTimeoutMs).toBe(750);
    expect(config.semanticUrl).toBe('http://semantic.test/assess');
    expect(config.schemaDir).toBe(join(cwd, 'env-schemas'));
  });

  it.each([
    ['1', true],
    ['YES', true],
    ['on', true],
    ['0', false],
    ['No', false],
  ])('should read boolean %s as %s', (raw, expected) => {
    expect(loadConfig({ cwd, env: { OUTPUTCHECK_STRICT_FIELDS: raw } }).strictFields).toBe(expected);
  });

  it('should ignore unrecognised environment values', () => {
    const config = loadConfig({
      cwd,
      env: { OUTPUTCHECK_STRICT_FIELDS: 'maybe', OUTPUTCHECK_SEMANTIC_TIMEOUT_MS: '-5' },
    });

    expect(config.strictFields).toBe(false);
    expect(config.semanticTimeoutMs).toBe(10_000);
    expect(console.error).toHaveBeenCalledWith(
      expect.stringContaining('Ignoring unrecognised boolean environment variable')
    );
  });

  it('should ignore a config file that is not JSON', async () => {
    await writeConfig('{ not json');
    expect(loadConfig({ cwd, env: {} }).model).toBe(DEFAULT_MODEL);
  });

  it('should ignore a config file with unknown keys', async () => {
    await writeConfig({ model: 'file-model', databasePath: '/tmp/db' });

    expect(loadConfig({ cwd, env: {} }).model).toBe(DEFAULT_MODEL);
    expect(console.error).toHaveBeenCalledWith(
      expect.stringContaining('Config file has invalid structure, ignoring it')
    );
  });
});

describe('builtinSchemaDir', () => {
  it('should point at the schemas folder beside package.json', () => {
    expect(builtinSchemaDir()).toBe(join(process.cwd(), 'schemas'));
  });
});
