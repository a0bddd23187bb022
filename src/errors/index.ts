/**
 * Error types for nestplan
 */

/**
 * Kinds of compilation failures
 */
export type CompileErrorKind =
  | 'CastError'
  | 'UnknownFieldInSubquery'
  | 'InvalidMapKey'
  | 'UnsupportedSubquerySelect'
  | 'IllegalMergeTarget'
  | 'IllegalPreloadInSubquery'
  | 'IllegalUpdateInSubquery'
  | 'SubqueryNotAllowedInBulkFrom'
  | 'AssociationRequiresSourceSchema'
  | 'CannotSubsetSubqueryStruct'
  | 'UnknownSchema'
  | 'UnknownField'
  | 'VirtualField'
  | 'UnknownAssociation'
  | 'UnknownBinding'
  | 'IllegalUpdate'
  | 'UnsupportedSelect'
  | 'SubQueryError';

/**
 * Rendered query attached to an error message
 */
export interface ErrorContext {
  readonly query?: string | undefined;
}

function withQuery(reason: string, context?: ErrorContext): string {
  return context?.query !== undefined ? `${reason} in query:\n\n${context.query}` : reason;
}

/**
 * Base class for every planner failure
 */
export class CompileError extends Error {
  public readonly kind: CompileErrorKind;
  /** Message without the rendered query */
  public readonly reason: string;
  public readonly query?: string | undefined;

  constructor(kind: CompileErrorKind, reason: string, context?: ErrorContext) {
    super(withQuery(reason, context));
    this.name = 'CompileError';
    this.kind = kind;
    this.reason = reason;
    if (context?.query !== undefined) this.query = context.query;
    Object.setPrototypeOf(this, CompileError.prototype);
  }
}

/**
 * Error thrown when a value cannot be cast to the type inferred for it
 */
export class CastError extends CompileError {
  public readonly value: unknown;
  public readonly type: string;
  public readonly clause: string;

  constructor(value: unknown, type: string, clause: string, context?: ErrorContext) {
    super(
      'CastError',
      `value \`${inspectValue(value)}\` in \`${clause}\` cannot be cast to type ${type}`,
      context
    );
    this.name = 'CastError';
    this.value = value;
    this.type = type;
    this.clause = clause;
    Object.setPrototypeOf(this, CastError.prototype);
  }
}

/**
 * Error thrown when an outer query references a field a subquery does not expose
 */
export class UnknownFieldInSubqueryError extends CompileError {
  public readonly field: string;

  constructor(field: string, context?: ErrorContext) {
    super('UnknownFieldInSubquery', `field \`${field}\` does not exist in subquery`, context);
    this.name = 'UnknownFieldInSubqueryError';
    this.field = field;
    Object.setPrototypeOf(this, UnknownFieldInSubqueryError.prototype);
  }
}

/**
 * Error thrown for map keys that are not atoms, or update keys a schema lacks
 */
export class InvalidMapKeyError extends CompileError {
  public readonly key: string;

  constructor(key: string, reason: string, context?: ErrorContext) {
    super('InvalidMapKey', reason, context);
    this.name = 'InvalidMapKeyError';
    this.key = key;
    Object.setPrototypeOf(this, InvalidMapKeyError.prototype);
  }
}

/**
 * Error thrown when a subquery selects something other than a source, a field or a map
 */
export class UnsupportedSubquerySelectError extends CompileError {
  constructor(expr: string, context?: ErrorContext) {
    super(
      'UnsupportedSubquerySelect',
      `subquery must select a source (t), a field (t.field) or a map, got: \`${expr}\``,
      context
    );
    this.name = 'UnsupportedSubquerySelectError';
    Object.setPrototypeOf(this, UnsupportedSubquerySelectError.prototype);
  }
}

/**
 * Error thrown when the operands of a merge cannot be combined
 */
export class IllegalMergeTargetError extends CompileError {
  constructor(reason: string, context?: ErrorContext) {
    super('IllegalMergeTarget', reason, context);
    this.name = 'IllegalMergeTargetError';
    Object.setPrototypeOf(this, IllegalMergeTargetError.prototype);
  }
}

export class IllegalPreloadInSubqueryError extends CompileError {
  constructor(context?: ErrorContext) {
    super('IllegalPreloadInSubquery', 'cannot preload associations in subquery', context);
    this.name = 'IllegalPreloadInSubqueryError';
    Object.setPrototypeOf(this, IllegalPreloadInSubqueryError.prototype);
  }
}

export class IllegalUpdateInSubqueryError extends CompileError {
  constructor(context?: ErrorContext) {
    super('IllegalUpdateInSubquery', 'subquery does not allow `update` expressions', context);
    this.name = 'IllegalUpdateInSubqueryError';
    Object.setPrototypeOf(this, IllegalUpdateInSubqueryError.prototype);
  }
}

export class SubqueryNotAllowedInBulkFromError extends CompileError {
  public readonly operation: string;

  constructor(operation: string, context?: ErrorContext) {
    super(
      'SubqueryNotAllowedInBulkFrom',
      `\`${operation}\` does not allow subqueries in \`from\``,
      context
    );
    this.name = 'SubqueryNotAllowedInBulkFromError';
    this.operation = operation;
    Object.setPrototypeOf(this, SubqueryNotAllowedInBulkFromError.prototype);
  }
}

export class AssociationRequiresSourceSchemaError extends CompileError {
  public readonly association: string;

  constructor(association: string, context?: ErrorContext) {
    super(
      'AssociationRequiresSourceSchema',
      `can only perform association joins on subqueries that return a source with schema in select (joining \`${association}\`)`,
      context
    );
    this.name = 'AssociationRequiresSourceSchemaError';
    this.association = association;
    Object.setPrototypeOf(this, AssociationRequiresSourceSchemaError.prototype);
  }
}

export class CannotSubsetSubqueryStructError extends CompileError {
  constructor(context?: ErrorContext) {
    super(
      'CannotSubsetSubqueryStruct',
      'it is not possible to return a map/struct subset of a subquery, ' +
        'you must explicitly select the whole subquery or individual fields only',
      context
    );
    this.name = 'CannotSubsetSubqueryStructError';
    Object.setPrototypeOf(this, CannotSubsetSubqueryStructError.prototype);
  }
}

/**
 * Error thrown when the schema resolver does not know an entity
 */
export class UnknownSchemaError extends CompileError {
  public readonly schema: string;

  constructor(schema: string, context?: ErrorContext) {
    super('UnknownSchema', `schema \`${schema}\` could not be resolved`, context);
    this.name = 'UnknownSchemaError';
    this.schema = schema;
    Object.setPrototypeOf(this, UnknownSchemaError.prototype);
  }
}

export class UnknownFieldError extends CompileError {
  public readonly field: string;
  public readonly schema: string;

  constructor(field: string, schema: string, clause: string, context?: ErrorContext) {
    super(
      'UnknownField',
      `field \`${field}\` in \`${clause}\` does not exist in schema ${schema}`,
      context
    );
    this.name = 'UnknownFieldError';
    this.field = field;
    this.schema = schema;
    Object.setPrototypeOf(this, UnknownFieldError.prototype);
  }
}

export class VirtualFieldError extends CompileError {
  public readonly field: string;

  constructor(field: string, schema: string, clause: string, context?: ErrorContext) {
    super(
      'VirtualField',
      `field \`${field}\` in \`${clause}\` is a virtual field in schema ${schema}`,
      context
    );
    this.name = 'VirtualFieldError';
    this.field = field;
    Object.setPrototypeOf(this, VirtualFieldError.prototype);
  }
}

export class UnknownAssociationError extends CompileError {
  constructor(association: string, schema: string, context?: ErrorContext) {
    super(
      'UnknownAssociation',
      `could not find association \`${association}\` on schema ${schema}`,
      context
    );
    this.name = 'UnknownAssociationError';
    Object.setPrototypeOf(this, UnknownAssociationError.prototype);
  }
}

export class UnknownBindingError extends CompileError {
  constructor(index: number, context?: ErrorContext) {
    super('UnknownBinding', `could not find binding at position ${index}`, context);
    this.name = 'UnknownBindingError';
    Object.setPrototypeOf(this, UnknownBindingError.prototype);
  }
}

export class IllegalUpdateError extends CompileError {
  constructor(reason: string, context?: ErrorContext) {
    super('IllegalUpdate', reason, context);
    this.name = 'IllegalUpdateError';
    Object.setPrototypeOf(this, IllegalUpdateError.prototype);
  }
}

export class UnsupportedSelectError extends CompileError {
  constructor(reason: string, context?: ErrorContext) {
    super('UnsupportedSelect', reason, context);
    this.name = 'UnsupportedSelectError';
    Object.setPrototypeOf(this, UnsupportedSelectError.prototype);
  }
}

/**
 * Error raised at a subquery boundary, wrapping whatever failed inside it
 */
export class SubQueryError extends CompileError {
  /** The original error, kept for pattern matching on the true cause */
  public readonly error: CompileError;

  constructor(error: CompileError, outerQuery: string) {
    super(
      'SubQueryError',
      'the following error happened while compiling a subquery.\n\n' +
        `    ** (${error.name}) ${indent(error.message)}\n\n` +
        `The subquery originated from the following query:\n\n${outerQuery}`
    );
    this.name = 'SubQueryError';
    this.error = error;
    Object.setPrototypeOf(this, SubQueryError.prototype);
  }
}

function indent(text: string): string {
  return text.replace(/\n(?=.)/g, '\n    ');
}

/**
 * Render a pinned value the way it reads in a query
 */
export function inspectValue(value: unknown): string {
  if (typeof value === 'string') return JSON.stringify(value);
  if (value === null || value === undefined) return 'nil';
  if (value instanceof Date) return value.toISOString();
  if (Array.isArray(value)) return `[${value.map(inspectValue).join(', ')}]`;
  if (typeof value === 'object') {
    const entries = Object.entries(value).map(([key, item]) => `${key}: ${inspectValue(item)}`);
    return `%{${entries.join(', ')}}`;
  }
  return String(value);
}
