import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { FileSchemaRepository } from '../../src/repository/index.js';

const INVOICE_YAML = `name: invoice
description: First invoice layout
version: 1.0.0
schema:
  total:
    type: number
    required: true
`;

describe('FileSchemaRepository', () => {
  let dir: string;

  beforeEach(async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    dir = await mkdtemp(join(tmpdir(), 'outputcheck-schemas-'));
    await mkdir(join(dir, 'nested'));
    await writeFile(join(dir, 'a.yaml'), INVOICE_YAML);
    await writeFile(
      join(dir, 'b.json'),
      JSON.stringify({
        name: 'invoice',
        description: 'Adds a currency',
        version: '1.2.0',
        validation_level: 'strict',
        schema: { total: { type: 'number', required: true }, currency: { type: 'string' } },
      })
    );
    await writeFile(
      join(dir, 'nested', 'c.yml'),
      INVOICE_YAML.replace('1.0.0', '1.10.0').replace('First invoice layout', 'Latest layout')
    );
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it('should load every version and order them numerically', async () => {
    const repository = new FileSchemaRepository(dir);

    expect(await repository.listSchemas()).toEqual([
      {
        name: 'invoice',
        description: 'Latest layout',
        currentVersion: '1.10.0',
        versions: ['1.0.0', '1.2.0', '1.10.0'],
        validationLevel: 'standard',
      },
    ]);
  });

  it('should get an exact version with its defaults applied', async () => {
    const repository = new FileSchemaRepository(dir);

    const first = await repository.getSchema('invoice', '1.0.0');
    const second = await repository.getSchema('invoice', '1.2.0');

    expect(first?.validation_level).toBe('standard');
    expect(second?.validation_level).toBe('strict');
    expect(await repository.getSchema('invoice', '3.0.0')).toBeNull();
    expect(await repository.getSchema('receipt')).toBeNull();
  });

  it('should skip files that do not parse or do not hold a record', async () => {
    await writeFile(join(dir, 'broken.yaml'), 'name: [unclosed');
    await writeFile(join(dir, 'partial.yaml'), 'name: receipt\nversion: 1.0.0\n');
    await writeFile(join(dir, 'notes.txt'), 'not a schema');
    const repository = new FileSchemaRepository(dir);

    const names = (await repository.listSchemas()).map((schema) => schema.name);

    expect(names).toEqual(['invoice']);
  });

  it('should keep the first of two files with the same version', async () => {
    await writeFile(
      join(dir, 'duplicate.yaml'),
      INVOICE_YAML.replace('1.0.0', '"1.0"').replace('First invoice layout', 'Shadowed')
    );
    const repository = new FileSchemaRepository(dir);

    const record = await repository.getSchema('invoice', '1.0.0');

    expect(record?.description).toBe('First invoice layout');
    expect(console.error).toHaveBeenCalledWith(
      expect.stringContaining('[WARN] Skipping duplicate schema version')
    );
  });

  it('should read the directory once until reloaded', async () => {
    const repository = new FileSchemaRepository(dir);
    await repository.listSchemas();

    await writeFile(
      join(dir, 'receipt.yaml'),
      'name: receipt\ndescription: Till receipt\nversion: 1.0.0\nschema:\n  amount:\n    type: number\n'
    );
    expect(await repository.getSchema('receipt')).toBeNull();

    repository.reload();
    expect((await repository.getSchema('receipt'))?.description).toBe('Till receipt');
  });
});
