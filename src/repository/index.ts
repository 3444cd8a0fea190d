/**
 * Schema Repository
 *
 * Read-only store of named, versioned schema records. The file-backed
 * repository reads every YAML or JSON file under a directory once, on first
 * use; files that do not hold a valid record are logged and skipped.
 */

import { readFile } from 'node:fs/promises';
import { glob } from 'glob';
import * as yaml from 'yaml';
import type { z } from 'zod';
import { SchemaRecordSchema, type SchemaRecord, type SchemaSummary } from '../types/index.js';
import { ValidationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export type SchemaRecordInput = z.input<typeof SchemaRecordSchema>;

export interface SchemaRepository {
  listSchemas(): Promise<SchemaSummary[]>;
  /** Latest version when `version` is omitted; null when nothing matches */
  getSchema(name: string, version?: string): Promise<SchemaRecord | null>;
}

/**
 * Order dotted-numeric versions: 1.2 < 1.10, 1.0 == 1.0.0
 */
export function compareVersions(a: string, b: string): number {
  const left = a.split('.').map(Number);
  const right = b.split('.').map(Number);
  const length = Math.max(left.length, right.length);
  for (let i = 0; i < length; i++) {
    const diff = (left[i] ?? 0) - (right[i] ?? 0);
    if (diff !== 0) {
      return diff;
    }
  }
  return 0;
}

/**
 * Name -> versions index shared by both repository flavours
 */
class SchemaIndex {
  private readonly byName = new Map<string, SchemaRecord[]>();

  get size(): number {
    return this.byName.size;
  }

  /** false when this name and version are already present */
  add(record: SchemaRecord): boolean {
    const versions = this.byName.get(record.name) ?? [];
    if (versions.some((existing) => compareVersions(existing.version, record.version) === 0)) {
      return false;
    }
    versions.push(record);
    versions.sort((a, b) => compareVersions(a.version, b.version));
    this.byName.set(record.name, versions);
    return true;
  }

  get(name: string, version?: string): SchemaRecord | null {
    const versions = this.byName.get(name);
    if (!versions) {
      return null;
    }
    if (version === undefined) {
      return versions[versions.length - 1] ?? null;
    }
    return versions.find((record) => compareVersions(record.version, version) === 0) ?? null;
  }

  list(): SchemaSummary[] {
    return [...this.byName.entries()]
      .sort(([a], [b]) => a.localeCompare(b))
      .flatMap(([name, versions]) => {
        const latest = versions[versions.length - 1];
        if (!latest) {
          return [];
        }
        return [
          {
            name,
            description: latest.description,
            currentVersion: latest.version,
            versions: versions.map((record) => record.version),
            validationLevel: latest.validation_level,
          },
        ];
      });
  }
}

export class InMemorySchemaRepository implements SchemaRepository {
  private readonly index = new SchemaIndex();

  /**
   * @throws {ValidationError} If a record is malformed
   */
  constructor(records: SchemaRecordInput[] = []) {
    for (const input of records) {
      const parsed = SchemaRecordSchema.safeParse(input);
      if (!parsed.success) {
        throw ValidationError.fromZodError(parsed.error);
      }
      this.index.add(parsed.data);
    }
  }

  async listSchemas(): Promise<SchemaSummary[]> {
    return this.index.list();
  }

  async getSchema(name: string, version?: string): Promise<SchemaRecord | null> {
    return this.index.get(name, version);
  }
}

export class FileSchemaRepository implements SchemaRepository {
  private loading: Promise<SchemaIndex> | null = null;

  constructor(private readonly directory: string) {}

  get root(): string {
    return this.directory;
  }

  async listSchemas(): Promise<SchemaSummary[]> {
    return (await this.load()).list();
  }

  async getSchema(name: string, version?: string): Promise<SchemaRecord | null> {
    return (await this.load()).get(name, version);
  }

  /**
   * Forget loaded records; the next call reads the directory again
   */
  reload(): void {
    this.loading = null;
  }

  private load(): Promise<SchemaIndex> {
    if (!this.loading) {
      // A failed read is not cached; the next call tries the directory again
      this.loading = this.readDirectory().catch((error: unknown) => {
        this.loading = null;
        throw error;
      });
    }
    return this.loading;
  }

  private async readDirectory(): Promise<SchemaIndex> {
    const index = new SchemaIndex();
    const files = await glob('**/*.{yaml,yml,json}', {
      cwd: this.directory,
      absolute: true,
      nodir: true,
    });
    files.sort();

    for (const file of files) {
      let content: unknown;
      try {
        content = yaml.parse(await readFile(file, 'utf-8'));
      } catch (error) {
        logger.warn('Could not read schema file', error, { file });
        continue;
      }

      const parsed = SchemaRecordSchema.safeParse(content);
      if (!parsed.success) {
        logger.warn('Skipping invalid schema file', undefined, {
          file,
          issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
        });
        continue;
      }

      if (!index.add(parsed.data)) {
        logger.warn('Skipping duplicate schema version', undefined, {
          file,
          name: parsed.data.name,
          version: parsed.data.version,
        });
      }
    }

    logger.info('Schema repository loaded', {
      directory: this.directory,
      files: files.length,
      schemas: index.size,
    });
    return index;
  }
}
