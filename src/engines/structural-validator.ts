/**
 * Structural Validator
 *
 * Walks a payload alongside a compiled schema and records one FieldError per
 * violated constraint. Errors come out in schema declaration order, so the
 * same payload always produces the same list. Malformed shapes (a string
 * where an object belongs, a non-object root) are reported, never thrown.
 */

import type {
  FieldError,
  PathSegment,
  StructuralResult,
  UnknownFieldPolicy,
} from '../types/index.js';
import { isRecord } from '../utils/guards.js';
import type { CheckOutcome } from './format-checkers.js';
import {
  describeNodeType,
  type CompiledField,
  type CompiledNode,
  type CompiledSchema,
  type ValueCheck,
} from './schema-compiler.js';

export interface StructuralOptions {
  /** 'reject' reports undeclared payload fields as unexpected_field */
  unknownFields?: UnknownFieldPolicy | undefined;
}

/**
 * Render a location as a dotted path, e.g. order.items[1].price
 */
export function formatLoc(loc: readonly PathSegment[]): string {
  let out = '';
  for (const segment of loc) {
    if (typeof segment === 'number') {
      out += `[${segment}]`;
    } else {
      out += out ? `.${segment}` : segment;
    }
  }
  return out || '(root)';
}

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (typeof value === 'number' && !Number.isInteger(value)) return 'number';
  if (typeof value === 'number') return 'integer';
  return typeof value;
}

function withArticle(word: string): string {
  return /^[aeiou]/.test(word) ? `an ${word}` : `a ${word}`;
}

class ErrorCollector {
  readonly errors: FieldError[] = [];

  get count(): number {
    return this.errors.length;
  }

  add(loc: readonly PathSegment[], outcome: CheckOutcome): void {
    if (!outcome) {
      return;
    }
    const error: FieldError = {
      loc: [...loc],
      type: outcome.type,
      msg: outcome.msg,
      suggestion: outcome.suggestion,
    };
    if (outcome.ctx) {
      error.ctx = outcome.ctx;
    }
    this.errors.push(error);
  }

  typeMismatch(loc: readonly PathSegment[], expected: string, value: unknown): void {
    this.add(loc, {
      type: 'type_mismatch',
      msg: `Expected ${expected}, received ${describeValue(value)}`,
      suggestion: `Provide ${withArticle(expected)} value for '${formatLoc(loc)}'`,
    });
  }
}

function runChecks<T>(
  checks: readonly ValueCheck<T>[],
  value: T,
  loc: readonly PathSegment[],
  collector: ErrorCollector
): void {
  for (const check of checks) {
    collector.add(loc, check(value));
  }
}

/**
 * Validate a payload against a compiled schema.
 */
export function validateStructure(
  schema: CompiledSchema,
  payload: unknown,
  options: StructuralOptions = {}
): StructuralResult {
  const collector = new ErrorCollector();
  const policy = options.unknownFields ?? 'ignore';

  if (!isRecord(payload)) {
    collector.add([], {
      type: 'type_mismatch',
      msg: `Expected object, received ${describeValue(payload)}`,
      suggestion: 'Send the content as a JSON object keyed by field name',
    });
    return { isStructurallyValid: false, errors: collector.errors, validatedData: null };
  }

  const data = validateFields(schema.fields, payload, [], collector, policy);
  const isStructurallyValid = collector.count === 0;

  return {
    isStructurallyValid,
    errors: collector.errors,
    validatedData: isStructurallyValid ? data : null,
  };
}

/**
 * Define rather than assign, so a field named `__proto__` stays an own property
 */
function setField(target: Record<string, unknown>, name: string, value: unknown): void {
  Object.defineProperty(target, name, { value, enumerable: true, writable: true, configurable: true });
}

function validateFields(
  fields: readonly CompiledField[],
  target: Record<string, unknown>,
  loc: readonly PathSegment[],
  collector: ErrorCollector,
  policy: UnknownFieldPolicy
): Record<string, unknown> {
  const out: Record<string, unknown> = {};

  for (const field of fields) {
    const fieldLoc = [...loc, field.name];
    const value = Object.hasOwn(target, field.name) ? target[field.name] : undefined;

    if (value === undefined) {
      if (field.required) {
        collector.add(fieldLoc, {
          type: 'missing_field',
          msg: 'Field required',
          suggestion: `Add the required field '${formatLoc(fieldLoc)}'`,
        });
      }
      continue;
    }

    if (value === null) {
      if (field.required) {
        collector.typeMismatch(fieldLoc, describeNodeType(field.node), value);
      } else {
        setField(out, field.name, null);
      }
      continue;
    }

    setField(out, field.name, validateNode(field.node, value, fieldLoc, collector, policy));
  }

  if (policy === 'reject') {
    const declared = new Set(fields.map((field) => field.name));
    for (const key of Object.keys(target)) {
      if (!declared.has(key)) {
        const keyLoc = [...loc, key];
        collector.add(keyLoc, {
          type: 'unexpected_field',
          msg: 'Field is not declared in the schema',
          suggestion: `Remove '${formatLoc(keyLoc)}' or declare it in the schema`,
        });
      }
    }
  }

  return out;
}

function validateNode(
  node: CompiledNode,
  value: unknown,
  loc: readonly PathSegment[],
  collector: ErrorCollector,
  policy: UnknownFieldPolicy
): unknown {
  switch (node.kind) {
    case 'string': {
      if (typeof value !== 'string') {
        collector.typeMismatch(loc, 'string', value);
        return value;
      }
      const before = collector.count;
      runChecks(node.checks, value, loc, collector);
      if (node.nameCheck && collector.count === before) {
        collector.add(loc, node.nameCheck(value));
      }
      return value;
    }

    case 'number': {
      const ok =
        typeof value === 'number' &&
        Number.isFinite(value) &&
        (!node.integer || Number.isInteger(value));
      if (!ok || typeof value !== 'number') {
        collector.typeMismatch(loc, describeNodeType(node), value);
        return value;
      }
      runChecks(node.checks, value, loc, collector);
      return value;
    }

    case 'boolean': {
      if (typeof value !== 'boolean') {
        collector.typeMismatch(loc, 'boolean', value);
        return value;
      }
      runChecks(node.checks, value, loc, collector);
      return value;
    }

    case 'array': {
      if (!Array.isArray(value)) {
        collector.typeMismatch(loc, 'array', value);
        return value;
      }
      const items: readonly unknown[] = value;
      runChecks(node.checks, items, loc, collector);
      const itemNode = node.items;
      if (!itemNode) {
        return [...items];
      }
      return items.map((item, index) =>
        validateNode(itemNode, item, [...loc, index], collector, policy)
      );
    }

    case 'object': {
      if (!isRecord(value)) {
        collector.typeMismatch(loc, 'object', value);
        return value;
      }
      if (!node.properties) {
        return { ...value };
      }
      return validateFields(node.properties, value, loc, collector, policy);
    }
  }
}
