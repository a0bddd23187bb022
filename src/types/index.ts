/**
 * Field Types
 *
 * Types attached to schema fields and subquery outputs, used to cast
 * pinned parameters and to check literals compared against fields.
 */

export type PrimitiveType =
  | 'id'
  | 'integer'
  | 'float'
  | 'decimal'
  | 'boolean'
  | 'string'
  | 'binary'
  | 'date'
  | 'datetime'
  | 'map'
  | 'any';

export interface ArrayType {
  readonly array: FieldType;
}

/**
 * Result of a cast or dump
 */
export type CastResult =
  | { readonly ok: true; readonly value: unknown }
  | { readonly ok: false };

/**
 * User-defined type with its own casting rules
 *
 * Example: a permalink primary key that accepts "1-hello-world" and
 * stores the integer 1.
 */
export interface CustomType {
  readonly name: string;
  /** Storage type the dumped value is handed to the adapter as */
  readonly base: PrimitiveType;
  cast(value: unknown): CastResult;
  dump?(value: unknown): CastResult;
}

export type FieldType = PrimitiveType | ArrayType | CustomType;

export const PRIMITIVE_TYPES: readonly PrimitiveType[] = [
  'id',
  'integer',
  'float',
  'decimal',
  'boolean',
  'string',
  'binary',
  'date',
  'datetime',
  'map',
  'any',
];

const ok = (value: unknown): CastResult => ({ ok: true, value });
const failed: CastResult = { ok: false };

export function isPrimitiveType(value: unknown): value is PrimitiveType {
  return typeof value === 'string' && PRIMITIVE_TYPES.some((type) => type === value);
}

export function isArrayType(type: FieldType): type is ArrayType {
  return typeof type === 'object' && 'array' in type;
}

export function isCustomType(type: FieldType): type is CustomType {
  return typeof type === 'object' && 'cast' in type;
}

/**
 * Human-readable type name used in error messages
 */
export function typeName(type: FieldType): string {
  if (isArrayType(type)) {
    return `{array, ${typeName(type.array)}}`;
  }
  if (isCustomType(type)) {
    return type.name;
  }
  return type;
}

/**
 * Storage type of a field type (custom types report their base)
 */
export function baseType(type: FieldType): PrimitiveType | ArrayType {
  return isCustomType(type) ? type.base : type;
}

/**
 * Natural type of a literal value
 */
export function literalType(value: string | number | boolean | null): FieldType {
  if (value === null) return 'any';
  if (typeof value === 'string') return 'string';
  if (typeof value === 'boolean') return 'boolean';
  return Number.isInteger(value) ? 'integer' : 'float';
}

/**
 * Cast a value to a field type. `null` casts to every type.
 */
export function castValue(type: FieldType, value: unknown): CastResult {
  if (value === null || value === undefined) {
    return ok(null);
  }

  if (isCustomType(type)) {
    return type.cast(value);
  }

  if (isArrayType(type)) {
    if (!Array.isArray(value)) return failed;
    const items: unknown[] = [];
    for (const item of value) {
      const result = castValue(type.array, item);
      if (!result.ok) return failed;
      items.push(result.value);
    }
    return ok(items);
  }

  switch (type) {
    case 'any':
      return ok(value);
    case 'id':
    case 'integer':
      return castInteger(value);
    case 'float':
    case 'decimal':
      return castFloat(value);
    case 'boolean':
      return castBoolean(value);
    case 'string':
      return typeof value === 'string' ? ok(value) : failed;
    case 'binary':
      return typeof value === 'string' || value instanceof Uint8Array ? ok(value) : failed;
    case 'date':
    case 'datetime':
      return castDate(value);
    case 'map':
      return typeof value === 'object' && !Array.isArray(value) && !(value instanceof Date)
        ? ok(value)
        : failed;
    default: {
      const _exhaustive: never = type;
      return _exhaustive;
    }
  }
}

/**
 * Dump a cast value to its storage form. Only custom types change the
 * value here; adapters apply their own dumping afterwards.
 */
export function dumpValue(type: FieldType, value: unknown): CastResult {
  if (value === null) return ok(null);
  if (isCustomType(type) && type.dump) {
    return type.dump(value);
  }
  if (isArrayType(type) && Array.isArray(value)) {
    const items: unknown[] = [];
    for (const item of value) {
      const result = dumpValue(type.array, item);
      if (!result.ok) return failed;
      items.push(result.value);
    }
    return ok(items);
  }
  return ok(value);
}

function castInteger(value: unknown): CastResult {
  if (typeof value === 'number') {
    return Number.isSafeInteger(value) ? ok(value) : failed;
  }
  if (typeof value === 'string' && /^-?\d+$/.test(value)) {
    const parsed = Number.parseInt(value, 10);
    return Number.isSafeInteger(parsed) ? ok(parsed) : failed;
  }
  return failed;
}

function castFloat(value: unknown): CastResult {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? ok(value) : failed;
  }
  if (typeof value === 'string' && /^-?\d+(\.\d+)?$/.test(value)) {
    return ok(Number.parseFloat(value));
  }
  return failed;
}

function castBoolean(value: unknown): CastResult {
  if (typeof value === 'boolean') return ok(value);
  if (value === 'true' || value === '1') return ok(true);
  if (value === 'false' || value === '0') return ok(false);
  return failed;
}

function castDate(value: unknown): CastResult {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? failed : ok(value);
  }
  if (typeof value === 'string' && /^\d{4}-\d{2}-\d{2}/.test(value)) {
    const date = new Date(value);
    return Number.isNaN(date.getTime()) ? failed : ok(date);
  }
  return failed;
}
