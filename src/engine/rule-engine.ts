// src/engine/rule-engine.ts

import { ConfigurationError, InvalidValidationError } from '../utils/errors.js';
import { BUILTIN_RULES, isEmptyValue } from './builtin-rules.js';
import { ParsedTag, parseRules, RuleTag } from './rule-parser.js';
import {
  FieldDefinition,
  FieldLevel,
  FieldNameResolver,
  FieldSpec,
  FieldViolations,
  RuleFunc,
  StructSchema,
  ValidationEngine,
  ViolationRecord,
} from './types.js';

const RESERVED_RULES = new Set(['omitempty']);

/** Whether a struct-field path (relative to the schema) takes part. */
type PathFilter = (path: string) => boolean;

interface FieldPosition {
  field: string;
  structField: string;
  namespace: string;
  structNamespace: string;
  parent?: Readonly<Record<string, unknown>>;
  other?: unknown;
}

export function defineStruct(name: string, fields: Record<string, FieldSpec>): StructSchema {
  return { name, fields };
}

function normalizeField(spec: FieldSpec): FieldDefinition {
  return typeof spec === 'string' ? { rules: spec } : spec;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function joinPath(prefix: string, segment: string): string {
  return prefix === '' ? segment : `${prefix}.${segment}`;
}

/** Listed paths and their descendants are excluded. */
function exceptFilter(fields: readonly string[]): PathFilter {
  return (path) => !fields.some((f) => path === f || path.startsWith(`${f}.`));
}

/**
 * Listed paths, their descendants and their ancestors (so traversal can
 * reach a listed child) are included.
 */
function partialFilter(fields: readonly string[]): PathFilter {
  return (path) =>
    fields.some((f) => path === f || path.startsWith(`${f}.`) || f.startsWith(`${path}.`));
}

export function engineMessage(namespace: string, field: string, rule: string): string {
  return `Key: '${namespace}' Error:Field validation for '${field}' failed on the '${rule}' tag`;
}

/**
 * Rule-expression validation engine. Struct shapes come from StructSchema
 * objects; variables are checked against an expression directly.
 */
export class RuleEngine implements ValidationEngine {
  private readonly rules = new Map<string, RuleFunc>(BUILTIN_RULES);
  private fieldNameResolver: FieldNameResolver = (structField) => structField;

  registerValidation(rule: string, fn: RuleFunc): void {
    if (RESERVED_RULES.has(rule) || /[,|=\s]/.test(rule)) {
      throw new ConfigurationError(`Rule name '${rule}' is reserved or contains a separator`);
    }
    this.rules.set(rule, fn);
  }

  registerFieldNameResolver(resolver: FieldNameResolver): void {
    this.fieldNameResolver = resolver;
  }

  hasRule(rule: string): boolean {
    return this.rules.has(rule);
  }

  struct(schema: StructSchema, value: unknown): Error | undefined {
    return this.run(() => this.validateStruct(schema, value, () => true));
  }

  structExcept(schema: StructSchema, value: unknown, fields: readonly string[]): Error | undefined {
    return this.run(() => this.validateStruct(schema, value, exceptFilter(fields)));
  }

  structPartial(schema: StructSchema, value: unknown, fields: readonly string[]): Error | undefined {
    return this.run(() => this.validateStruct(schema, value, partialFilter(fields)));
  }

  var(value: unknown, rules: string): Error | undefined {
    return this.varWithValue(value, undefined, rules);
  }

  varWithValue(value: unknown, other: unknown, rules: string): Error | undefined {
    return this.run(() => {
      const position: FieldPosition = { field: '', structField: '', namespace: '', structNamespace: '', other };
      const record = this.checkField(value, rules, position);
      return record ? [record] : [];
    });
  }

  /**
   * Turn the collected records into the engine result. Anything thrown while
   * evaluating (bad usage, a throwing predicate) becomes the returned error.
   */
  private run(validate: () => ViolationRecord[]): Error | undefined {
    try {
      const records = validate();
      return records.length > 0 ? new FieldViolations(records) : undefined;
    } catch (error) {
      return error instanceof Error ? error : new InvalidValidationError(String(error));
    }
  }

  private validateStruct(schema: StructSchema, value: unknown, include: PathFilter): ViolationRecord[] {
    if (!isRecord(value)) {
      const received = value === null ? 'null' : Array.isArray(value) ? 'array' : typeof value;
      throw new InvalidValidationError(
        `Struct validation of '${schema.name}' expects an object, received ${received}`
      );
    }

    const records: ViolationRecord[] = [];
    this.walk(schema.fields, value, include, records, {
      path: '',
      namespace: schema.name,
      structNamespace: schema.name,
    });
    return records;
  }

  private walk(
    fields: Readonly<Record<string, FieldSpec>>,
    parent: Readonly<Record<string, unknown>>,
    include: PathFilter,
    records: ViolationRecord[],
    scope: { path: string; namespace: string; structNamespace: string }
  ): void {
    for (const [structField, spec] of Object.entries(fields)) {
      const path = joinPath(scope.path, structField);
      if (!include(path)) continue;

      const definition = normalizeField(spec);
      const field = this.fieldNameResolver(structField, definition);
      const value = Object.hasOwn(parent, structField) ? parent[structField] : undefined;
      const position: FieldPosition = {
        field,
        structField,
        namespace: joinPath(scope.namespace, field),
        structNamespace: joinPath(scope.structNamespace, structField),
        parent,
      };

      if (definition.rules) {
        const record = this.checkField(value, definition.rules, position);
        if (record) {
          records.push(record);
          continue;
        }
      }

      if (definition.fields && isRecord(value)) {
        this.walk(definition.fields, value, include, records, {
          path,
          namespace: position.namespace,
          structNamespace: position.structNamespace,
        });
      }
    }
  }

  /**
   * Evaluate an expression against one value and report the first failing
   * element, if any.
   */
  private checkField(value: unknown, rules: string, position: FieldPosition): ViolationRecord | undefined {
    const parsed = parseRules(rules);
    if (parsed.omitEmpty && isEmptyValue(value)) {
      return undefined;
    }

    for (const tag of parsed.tags) {
      const failedParam = this.evaluateTag(tag, value, position);
      if (failedParam !== undefined) {
        const rule = tag.alternatives.length > 1 ? tag.raw : tag.alternatives[0].name;
        return {
          field: position.field,
          structField: position.structField,
          namespace: position.namespace,
          structNamespace: position.structNamespace,
          rule,
          param: failedParam,
          value,
          message: engineMessage(position.namespace, position.field, rule),
        };
      }
    }

    return undefined;
  }

  /**
   * Returns undefined when the element passes, otherwise the parameter of the
   * last alternative tried.
   */
  private evaluateTag(tag: ParsedTag, value: unknown, position: FieldPosition): string | undefined {
    let lastParam = '';
    for (const alternative of tag.alternatives) {
      if (this.evaluate(alternative, value, position)) {
        return undefined;
      }
      lastParam = alternative.param;
    }
    return lastParam;
  }

  private evaluate(tag: RuleTag, value: unknown, position: FieldPosition): boolean {
    const fn = this.rules.get(tag.name);
    if (!fn) {
      throw new InvalidValidationError(
        `Undefined validation function '${tag.name}' on field '${position.field}'`,
        tag.name,
        position.field
      );
    }

    const fl: FieldLevel = {
      value,
      param: tag.param,
      field: position.field,
      structField: position.structField,
      parent: position.parent,
      other: position.other,
    };
    return fn(fl);
  }
}
