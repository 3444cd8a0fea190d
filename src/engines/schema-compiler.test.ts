import { describe, it, expect } from 'vitest';
import { CompilationError } from '../utils/errors.js';
import { compileSchema, describeNodeType, safeCompileSchema } from './schema-compiler.js';

function compileIssues(description: unknown): string[] {
  const result = safeCompileSchema(description);
  if (result.success) {
    return [];
  }
  return result.error.issues.map((issue) => `${issue.path}: ${issue.message}`);
}

describe('schema compiler', () => {
  it('compiles fields in declaration order', () => {
    const schema = compileSchema({
      name: { type: 'string', required: true },
      age: { type: 'integer', min: 0 },
      tags: { type: 'array', items: { type: 'string' } },
    });

    expect(schema.fields.map((field) => [field.name, field.required, field.node.kind])).toEqual([
      ['name', true, 'string'],
      ['age', false, 'number'],
      ['tags', false, 'array'],
    ]);
  });

  it('distinguishes integer from number', () => {
    const schema = compileSchema({ a: { type: 'integer' }, b: { type: 'number' } });
    expect(schema.fields.map((field) => describeNodeType(field.node))).toEqual(['integer', 'number']);
  });

  it('recurses into nested objects and array items', () => {
    const schema = compileSchema({
      order: {
        type: 'object',
        properties: {
          items: {
            type: 'array',
            items: { type: 'object', properties: { sku: { type: 'string', required: true } } },
          },
        },
      },
    });

    const order = schema.fields[0]?.node;
    expect(order?.kind).toBe('object');
    if (order?.kind !== 'object' || !order.properties) throw new Error('expected object node');
    const items = order.properties[0]?.node;
    if (items?.kind !== 'array' || !items.items) throw new Error('expected array node');
    expect(items.items.kind).toBe('object');
  });

  it('layers the name check on alias fields and format: name', () => {
    const schema = compileSchema({
      Customer_Name: { type: 'string' },
      nickname: { type: 'string', format: 'name' },
      title: { type: 'string' },
    });
    const nameChecks = schema.fields.map((field) =>
      field.node.kind === 'string' ? field.node.nameCheck !== null : null
    );
    expect(nameChecks).toEqual([true, true, false]);
  });

  it('uses configured aliases instead of the defaults', () => {
    const schema = compileSchema(
      { name: { type: 'string' }, author: { type: 'string' } },
      { nameFieldAliases: ['author'] }
    );
    const nameChecks = schema.fields.map((field) =>
      field.node.kind === 'string' ? field.node.nameCheck !== null : null
    );
    expect(nameChecks).toEqual([false, true]);
  });

  it('reports the name heuristic reason in ctx', () => {
    const schema = compileSchema({ name: { type: 'string' } });
    const node = schema.fields[0]?.node;
    if (node?.kind !== 'string' || !node.nameCheck) throw new Error('expected name check');
    expect(node.nameCheck('qwertyuiop')).toEqual({
      type: 'invalid_name',
      msg: 'Name looks like a keyboard pattern',
      suggestion: "Provide a real person's name for 'name'",
      ctx: { reason: 'keyboard_pattern' },
    });
  });

  describe('configuration errors', () => {
    it('rejects a non-object description', () => {
      expect(() => compileSchema(['name'])).toThrow(CompilationError);
    });

    it('rejects a constraint on the wrong type', () => {
      expect(compileIssues({ age: { type: 'integer', pattern: '\\d+' } })).toEqual([
        'age: "pattern" is not valid on a field of type integer',
      ]);
    });

    it('rejects min_length greater than max_length', () => {
      expect(compileIssues({ code: { type: 'string', min_length: 5, max_length: 2 } })).toEqual([
        'code: min_length (5) is greater than max_length (2)',
      ]);
    });

    it('rejects an empty numeric range', () => {
      expect(compileIssues({ score: { type: 'number', min: 10, max: 1 } })).toEqual([
        'score: Numeric bounds leave no value in range',
      ]);
      expect(compileIssues({ score: { type: 'number', gt: 1, lt: 1 } })).toEqual([
        'score: Numeric bounds leave no value in range',
      ]);
    });

    it('accepts a single-value inclusive range', () => {
      expect(compileIssues({ score: { type: 'number', min: 1, max: 1 } })).toEqual([]);
    });

    it('rejects an invalid regular expression', () => {
      const issues = compileIssues({ code: { type: 'string', pattern: '([a-z' } });
      expect(issues).toHaveLength(1);
      expect(issues[0]).toMatch(/^code: pattern is not a valid regular expression: /);
    });

    it('rejects enum values of the wrong type', () => {
      expect(compileIssues({ level: { type: 'integer', enum: [1, 'two'] } })).toEqual([
        'level: enum values "two" are not of type integer',
      ]);
    });

    it('rejects unknown keys and unknown types', () => {
      expect(compileIssues({ a: { type: 'string', minLength: 2 } })).toHaveLength(1);
      expect(compileIssues({ a: { type: 'date' } })).toHaveLength(1);
    });

    it('rejects a field spec that is not an object', () => {
      expect(compileIssues({ a: 'string' })).toEqual(['a: Field spec must be an object with a "type"']);
    });

    it('collects every offending field with its full path', () => {
      const issues = compileIssues({
        age: { type: 'integer', min_length: 1 },
        address: {
          type: 'object',
          properties: { zip: { type: 'string', min: 5 } },
        },
        tags: { type: 'array', items: { type: 'boolean', max_length: 1 } },
      });

      expect(issues).toEqual([
        'age: "min_length" is not valid on a field of type integer',
        'address.zip: "min" is not valid on a field of type string',
        'tags[]: "max_length" is not valid on a field of type boolean',
      ]);
    });

    it('names all issues in the error message', () => {
      try {
        compileSchema({ a: { type: 'string', min: 1 }, b: { type: 'boolean', pattern: 'x' } });
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(CompilationError);
        if (!(error instanceof CompilationError)) return;
        expect(error.message).toBe(
          'Invalid schema: a: "min" is not valid on a field of type string; b: "pattern" is not valid on a field of type boolean'
        );
        expect(error.code).toBe('SCHEMA_ERROR');
      }
    });
  });

  it('never throws from safeCompileSchema for bad descriptions', () => {
    expect(safeCompileSchema(null).success).toBe(false);
    expect(safeCompileSchema({}).success).toBe(true);
  });
});
