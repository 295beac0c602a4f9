// src/engine/types.ts

/**
 * What a rule predicate sees about the value under validation.
 */
export interface FieldLevel {
  /** The value being checked */
  readonly value: unknown;
  /** Rule parameter, '' when the tag has none (e.g. `min=3` -> '3') */
  readonly param: string;
  /** Display name of the field ('' for variables) */
  readonly field: string;
  /** Property key of the field ('' for variables) */
  readonly structField: string;
  /** Object holding the field; undefined for variables */
  readonly parent?: Readonly<Record<string, unknown>>;
  /** Comparison value passed to varWithValue */
  readonly other?: unknown;
}

export type RuleFunc = (fl: FieldLevel) => boolean;

/**
 * Alias names a field may carry. The alias resolver picks the display name
 * from them; the default resolver ignores them and uses the property key.
 */
export interface FieldAliases {
  field?: string;
  json?: string;
  form?: string;
  xml?: string;
}

export interface FieldDefinition extends FieldAliases {
  /** Rule expression, e.g. 'required,min=3' */
  rules?: string;
  /** Nested struct, validated when the field holds an object */
  fields?: Record<string, FieldSpec>;
}

export type FieldSpec = string | FieldDefinition;

export interface StructSchema {
  /** Struct name, first segment of every namespace */
  readonly name: string;
  readonly fields: Readonly<Record<string, FieldSpec>>;
}

/**
 * Maps a property key and its definition to the name reported as `field`.
 */
export type FieldNameResolver = (structField: string, definition: FieldDefinition) => string;

/**
 * One failed rule on one field.
 */
export interface ViolationRecord {
  /** Resolved display name ('' for variables) */
  readonly field: string;
  /** Property key ('' for variables) */
  readonly structField: string;
  /** Dotted path of display names, prefixed by the struct name */
  readonly namespace: string;
  /** Dotted path of property keys, prefixed by the struct name */
  readonly structNamespace: string;
  readonly rule: string;
  readonly param: string;
  readonly value: unknown;
  /** Untranslated message produced by the engine */
  readonly message: string;
}

/**
 * The error an engine returns when one or more rules failed.
 */
export class FieldViolations extends Error {
  constructor(public readonly records: readonly ViolationRecord[]) {
    super(records.map((r) => r.message).join('\n'));
    this.name = 'FieldViolations';
  }
}

/**
 * Engines other than RuleEngine report rule failures by returning a
 * FieldViolations (or a subclass); anything else is an internal error.
 */
export function isViolationSet(error: unknown): error is FieldViolations {
  return error instanceof FieldViolations;
}

/**
 * Boundary to the engine that executes rules. Every validation method
 * returns undefined on success, a FieldViolations on rule failures, or any
 * other Error when the call itself was invalid.
 */
export interface ValidationEngine {
  registerValidation(rule: string, fn: RuleFunc): void;
  registerFieldNameResolver(resolver: FieldNameResolver): void;
  struct(schema: StructSchema, value: unknown): Error | undefined;
  structExcept(schema: StructSchema, value: unknown, fields: readonly string[]): Error | undefined;
  structPartial(schema: StructSchema, value: unknown, fields: readonly string[]): Error | undefined;
  var(value: unknown, rules: string): Error | undefined;
  varWithValue(value: unknown, other: unknown, rules: string): Error | undefined;
}
