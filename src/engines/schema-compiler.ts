/**
 * Schema Compiler
 *
 * Turns a declarative schema description (field name -> field spec) into a
 * tree of compiled validators that mirrors the expected payload shape.
 *
 * Compilation is where configuration mistakes surface: a spec whose
 * constraints don't fit its type (a pattern on a number, a length on a
 * boolean, min above max, a broken regular expression) fails here with a
 * CompilationError listing every offending field, before any payload is read.
 *
 * A compiled schema holds no request state and may be reused for any number
 * of validations.
 */

import {
  FieldSpecShapeSchema,
  type EnumValue,
  type FieldSpecShape,
  type FieldType,
  type SchemaDescription,
} from '../types/index.js';
import { CompilationError, type CompilationIssue } from '../utils/errors.js';
import { isRecord } from '../utils/guards.js';
import {
  checkDate,
  checkEmail,
  checkEnum,
  checkLength,
  checkPattern,
  checkRange,
  compileAnchoredPattern,
  type CheckOutcome,
} from './format-checkers.js';
import {
  checkName,
  describeNameRejection,
  DEFAULT_NAME_HEURISTIC_OPTIONS,
  type NameHeuristicOptions,
} from './name-heuristic.js';

/**
 * Field names that get the name heuristic without asking for it
 */
export const DEFAULT_NAME_FIELD_ALIASES: readonly string[] = [
  'name',
  'customer_name',
  'full_name',
  'first_name',
  'last_name',
  'contact_name',
  'person_name',
];

export interface CompileOptions {
  /** Matched exactly, ignoring case */
  nameFieldAliases?: readonly string[] | undefined;
  nameHeuristic?: NameHeuristicOptions | undefined;
}

export type ValueCheck<T> = (value: T) => CheckOutcome;

export interface StringNode {
  kind: 'string';
  checks: ValueCheck<string>[];
  /** Applied only after every declared check has passed */
  nameCheck: ValueCheck<string> | null;
}

export interface NumberNode {
  kind: 'number';
  integer: boolean;
  checks: ValueCheck<number>[];
}

export interface BooleanNode {
  kind: 'boolean';
  checks: ValueCheck<boolean>[];
}

export interface ArrayNode {
  kind: 'array';
  checks: ValueCheck<readonly unknown[]>[];
  /** null accepts any element */
  items: CompiledNode | null;
}

export interface ObjectNode {
  kind: 'object';
  /** null accepts any object */
  properties: CompiledField[] | null;
}

export type CompiledNode = StringNode | NumberNode | BooleanNode | ArrayNode | ObjectNode;

export interface CompiledField {
  name: string;
  required: boolean;
  node: CompiledNode;
}

export interface CompiledSchema {
  readonly fields: readonly CompiledField[];
  /** The description this schema was compiled from */
  readonly description: SchemaDescription;
}

export type SafeCompileResult =
  | { success: true; schema: CompiledSchema }
  | { success: false; error: CompilationError };

interface CompileContext {
  issues: CompilationIssue[];
  aliases: Set<string>;
  heuristic: NameHeuristicOptions;
}

/**
 * Human-readable name of the type a node expects
 */
export function describeNodeType(node: CompiledNode): string {
  if (node.kind === 'number') {
    return node.integer ? 'integer' : 'number';
  }
  return node.kind;
}

/**
 * Compile a schema description.
 *
 * @throws {CompilationError} If the description is malformed or inconsistent
 */
export function compileSchema(description: unknown, options: CompileOptions = {}): CompiledSchema {
  if (!isRecord(description)) {
    throw new CompilationError([
      { path: '', message: 'Schema description must be an object mapping field names to field specs' },
    ]);
  }

  const ctx: CompileContext = {
    issues: [],
    aliases: new Set(
      (options.nameFieldAliases ?? DEFAULT_NAME_FIELD_ALIASES).map((alias) => alias.toLowerCase())
    ),
    heuristic: options.nameHeuristic ?? DEFAULT_NAME_HEURISTIC_OPTIONS,
  };

  const fields = compileProperties(description, '', ctx);

  if (ctx.issues.length > 0) {
    throw new CompilationError(ctx.issues);
  }

  return { fields, description };
}

/**
 * Compile without throwing
 */
export function safeCompileSchema(description: unknown, options: CompileOptions = {}): SafeCompileResult {
  try {
    return { success: true, schema: compileSchema(description, options) };
  } catch (error) {
    if (error instanceof CompilationError) {
      return { success: false, error };
    }
    throw error;
  }
}

function compileProperties(
  properties: Record<string, unknown>,
  parentPath: string,
  ctx: CompileContext
): CompiledField[] {
  const fields: CompiledField[] = [];

  for (const [name, raw] of Object.entries(properties)) {
    const path = parentPath ? `${parentPath}.${name}` : name;
    const compiled = compileSpec(raw, path, name, ctx);
    if (compiled) {
      fields.push({ name, required: compiled.required, node: compiled.node });
    }
  }

  return fields;
}

function compileSpec(
  raw: unknown,
  path: string,
  fieldName: string | null,
  ctx: CompileContext
): { node: CompiledNode; required: boolean } | null {
  if (!isRecord(raw)) {
    ctx.issues.push({ path, message: 'Field spec must be an object with a "type"' });
    return null;
  }

  const parsed = FieldSpecShapeSchema.safeParse(raw);
  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      ctx.issues.push({
        path,
        message: issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
      });
    }
    return null;
  }

  const spec = parsed.data;
  checkConsistency(spec, path, ctx);

  return { node: buildNode(spec, path, fieldName, ctx), required: spec.required ?? false };
}

const KEYS_BY_TYPE: Record<string, readonly FieldType[]> = {
  min_length: ['string', 'array'],
  max_length: ['string', 'array'],
  min: ['number', 'integer'],
  max: ['number', 'integer'],
  gt: ['number', 'integer'],
  lt: ['number', 'integer'],
  pattern: ['string'],
  format: ['string'],
  enum: ['string', 'number', 'integer', 'boolean'],
  items: ['array'],
  properties: ['object'],
};

function matchesType(value: EnumValue, type: FieldType): boolean {
  switch (type) {
    case 'string':
      return typeof value === 'string';
    case 'number':
      return typeof value === 'number' && Number.isFinite(value);
    case 'integer':
      return Number.isInteger(value);
    case 'boolean':
      return typeof value === 'boolean';
    default:
      return false;
  }
}

function checkConsistency(spec: FieldSpecShape, path: string, ctx: CompileContext): void {
  const report = (message: string): void => {
    ctx.issues.push({ path, message });
  };

  for (const [key, value] of Object.entries(spec)) {
    const allowed = KEYS_BY_TYPE[key];
    if (value !== undefined && allowed && !allowed.includes(spec.type)) {
      report(`"${key}" is not valid on a field of type ${spec.type}`);
    }
  }

  if (
    spec.min_length !== undefined &&
    spec.max_length !== undefined &&
    spec.min_length > spec.max_length
  ) {
    report(`min_length (${spec.min_length}) is greater than max_length (${spec.max_length})`);
  }

  const lower = [spec.min, spec.gt].filter((bound): bound is number => bound !== undefined);
  const upper = [spec.max, spec.lt].filter((bound): bound is number => bound !== undefined);
  if (lower.length > 0 && upper.length > 0) {
    const low = Math.max(...lower);
    const high = Math.min(...upper);
    const exclusive = (spec.gt !== undefined && spec.gt === low) || (spec.lt !== undefined && spec.lt === high);
    if (low > high || (exclusive && low === high)) {
      report('Numeric bounds leave no value in range');
    }
  }

  if (spec.enum && (spec.type === 'string' || spec.type === 'number' || spec.type === 'integer' || spec.type === 'boolean')) {
    const mismatched = spec.enum.filter((value) => !matchesType(value, spec.type));
    if (mismatched.length > 0) {
      report(`enum values ${mismatched.map((v) => JSON.stringify(v)).join(', ')} are not of type ${spec.type}`);
    }
  }

  if (spec.items !== undefined && !isRecord(spec.items)) {
    report('"items" must be a field spec object');
  }

  if (spec.properties !== undefined && !isRecord(spec.properties)) {
    report('"properties" must be an object mapping field names to field specs');
  }
}

function buildNode(
  spec: FieldSpecShape,
  path: string,
  fieldName: string | null,
  ctx: CompileContext
): CompiledNode {
  switch (spec.type) {
    case 'string':
      return buildStringNode(spec, path, fieldName, ctx);

    case 'number':
    case 'integer': {
      const checks: ValueCheck<number>[] = [];
      const allowed = spec.enum;
      if (allowed) {
        checks.push((value) => checkEnum(value, allowed));
      }
      const bounds = { min: spec.min, max: spec.max, gt: spec.gt, lt: spec.lt };
      if (Object.values(bounds).some((bound) => bound !== undefined)) {
        checks.push((value) => checkRange(value, bounds));
      }
      return { kind: 'number', integer: spec.type === 'integer', checks };
    }

    case 'boolean': {
      const checks: ValueCheck<boolean>[] = [];
      const allowed = spec.enum;
      if (allowed) {
        checks.push((value) => checkEnum(value, allowed));
      }
      return { kind: 'boolean', checks };
    }

    case 'array': {
      const checks: ValueCheck<readonly unknown[]>[] = [];
      const lengthBounds = { minLength: spec.min_length, maxLength: spec.max_length };
      if (lengthBounds.minLength !== undefined || lengthBounds.maxLength !== undefined) {
        checks.push((value) => checkLength(value, lengthBounds));
      }
      let items: CompiledNode | null = null;
      if (isRecord(spec.items)) {
        items = compileSpec(spec.items, `${path}[]`, null, ctx)?.node ?? null;
      }
      return { kind: 'array', checks, items };
    }

    case 'object': {
      const properties = isRecord(spec.properties)
        ? compileProperties(spec.properties, path, ctx)
        : null;
      return { kind: 'object', properties };
    }
  }
}

function buildStringNode(
  spec: FieldSpecShape,
  path: string,
  fieldName: string | null,
  ctx: CompileContext
): StringNode {
  const checks: ValueCheck<string>[] = [];

  const lengthBounds = { minLength: spec.min_length, maxLength: spec.max_length };
  if (lengthBounds.minLength !== undefined || lengthBounds.maxLength !== undefined) {
    checks.push((value) => checkLength(value, lengthBounds));
  }

  const allowed = spec.enum;
  if (allowed) {
    checks.push((value) => checkEnum(value, allowed));
  }

  const source = spec.pattern;
  if (source !== undefined) {
    try {
      const anchored = compileAnchoredPattern(source);
      checks.push((value) => checkPattern(value, anchored, source));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      ctx.issues.push({ path, message: `pattern is not a valid regular expression: ${reason}` });
    }
  }

  if (spec.format === 'email') {
    checks.push(checkEmail);
  } else if (spec.format === 'date') {
    checks.push(checkDate);
  }

  const isNameField =
    spec.format === 'name' ||
    (fieldName !== null && ctx.aliases.has(fieldName.toLowerCase()));

  const label = fieldName ?? 'this field';
  const heuristic = ctx.heuristic;
  const nameCheck: ValueCheck<string> | null = isNameField
    ? (value) => {
        const result = checkName(value, heuristic);
        if (result.accepted) {
          return null;
        }
        return {
          type: 'invalid_name',
          msg: describeNameRejection(result.reason),
          suggestion: `Provide a real person's name for '${label}'`,
          ctx: { reason: result.reason },
        };
      }
    : null;

  return { kind: 'string', checks, nameCheck };
}
