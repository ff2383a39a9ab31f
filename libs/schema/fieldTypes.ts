/**
 * Closed set of field types a profile type schema can declare.
 * Adding a type means extending FIELD_TYPES and every switch over FieldType.
 */
export const FIELD_TYPES = ['Boolean', 'Integer', 'Float', 'String', 'Map', 'List'] as const;

export type FieldType = (typeof FIELD_TYPES)[number];

/**
 * JSON-compatible value. Top-level field values are never null; null is
 * tolerated only inside Map and List contents.
 */
export type FieldValue =
    | null
    | boolean
    | number
    | string
    | FieldValue[]
    | { [key: string]: FieldValue };

export type FieldMap = { [key: string]: FieldValue };

export type CoercionResult =
    | { ok: true; value: FieldValue }
    | { ok: false };

const INTEGER_LITERAL = /^[+-]?\d+$/;
const FLOAT_LITERAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export function isFieldType(value: string): value is FieldType {
    return (FIELD_TYPES as readonly string[]).includes(value);
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
        return false;
    }
    const proto = Object.getPrototypeOf(value);
    return proto === Object.prototype || proto === null;
}

export function isFieldValue(value: unknown): value is FieldValue {
    if (value === null || typeof value === 'boolean' || typeof value === 'string') {
        return true;
    }
    if (typeof value === 'number') {
        return Number.isFinite(value);
    }
    if (Array.isArray(value)) {
        return value.every(isFieldValue);
    }
    if (isPlainObject(value)) {
        return Object.values(value).every(isFieldValue);
    }
    return false;
}

export function isFieldMap(value: unknown): value is FieldMap {
    return isPlainObject(value) && Object.values(value).every(isFieldValue);
}

/**
 * Short human-readable description of a received value for error messages.
 */
export function describeValue(value: unknown): string {
    if (value === null) return 'null';
    if (value === undefined) return 'undefined';
    if (Array.isArray(value)) return `list of ${value.length} item${value.length === 1 ? '' : 's'}`;
    switch (typeof value) {
        case 'string':
            return `string ${JSON.stringify(value.length > 64 ? `${value.slice(0, 64)}...` : value)}`;
        case 'number':
        case 'boolean':
        case 'bigint':
            return `${typeof value} ${String(value)}`;
        case 'object':
            return isPlainObject(value) ? 'map' : `object ${value.constructor?.name ?? 'Object'}`;
        default:
            return typeof value;
    }
}

/**
 * Checks a value against a field type.
 *
 * With `coerce` set, a numeric string that parses cleanly is accepted for
 * Integer and Float. Nothing else is ever converted: booleans are not numbers,
 * numbers are not strings, and a fractional number is not an Integer.
 */
export function coerceValue(type: FieldType, value: unknown, coerce: boolean): CoercionResult {
    switch (type) {
        case 'Boolean':
            return typeof value === 'boolean' ? { ok: true, value } : { ok: false };

        case 'String':
            return typeof value === 'string' ? { ok: true, value } : { ok: false };

        case 'Integer':
            if (typeof value === 'number') {
                return Number.isSafeInteger(value) ? { ok: true, value } : { ok: false };
            }
            if (coerce && typeof value === 'string' && INTEGER_LITERAL.test(value)) {
                const parsed = Number(value);
                return Number.isSafeInteger(parsed) ? { ok: true, value: parsed } : { ok: false };
            }
            return { ok: false };

        case 'Float':
            if (typeof value === 'number') {
                return Number.isFinite(value) ? { ok: true, value } : { ok: false };
            }
            if (coerce && typeof value === 'string' && FLOAT_LITERAL.test(value)) {
                const parsed = Number(value);
                return Number.isFinite(parsed) ? { ok: true, value: parsed } : { ok: false };
            }
            return { ok: false };

        case 'Map':
            return isFieldMap(value) ? { ok: true, value } : { ok: false };

        case 'List':
            return Array.isArray(value) && value.every(isFieldValue) ? { ok: true, value } : { ok: false };
    }
}

/**
 * Recursively freezes a field value in place and returns it.
 */
export function deepFreeze<T extends FieldValue>(value: T): T {
    if (typeof value === 'object' && value !== null) {
        for (const child of Object.values(value)) {
            deepFreeze(child);
        }
        Object.freeze(value);
    }
    return value;
}
