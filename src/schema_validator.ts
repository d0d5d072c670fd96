/**
 * Schema Validator - JSON schema subset for checkpoint records and rule documents
 *
 * Supports type (with integer), required, properties, items, minItems, enum,
 * minLength, pattern, minimum and maximum. Every violation is collected with
 * the dotted path of the offending field. A type mismatch stops the checks
 * below it.
 */

export interface ValidationError {
    path: string;
    message: string;
}

export interface ValidationResult {
    valid: boolean;
    errors: ValidationError[];
}

export type JsonType = 'object' | 'array' | 'string' | 'number' | 'integer' | 'boolean' | 'null';

export interface JsonSchema {
    type: JsonType | JsonType[];
    properties?: Record<string, JsonSchema>;
    required?: string[];
    items?: JsonSchema;
    enum?: readonly (string | number | boolean | null)[];
    pattern?: string;
    minimum?: number;
    maximum?: number;
    minItems?: number;
    minLength?: number;
}

type Report = (path: string, message: string) => void;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function jsonTypeOf(value: unknown): JsonType | 'undefined' | 'other' {
    if (value === null) return 'null';
    if (Array.isArray(value)) return 'array';
    switch (typeof value) {
        case 'number': return Number.isInteger(value) ? 'integer' : 'number';
        case 'string': return 'string';
        case 'boolean': return 'boolean';
        case 'object': return 'object';
        case 'undefined': return 'undefined';
        default: return 'other';
    }
}

/* -------------------------------------------------------------------------- */
/* Keyword checks                                                             */
/* -------------------------------------------------------------------------- */

function checkType(value: unknown, schema: JsonSchema, path: string, report: Report): boolean {
    const allowed = Array.isArray(schema.type) ? schema.type : [schema.type];
    const actual = jsonTypeOf(value);
    // an integer is also a number
    if (allowed.some((t) => t === actual || (t === 'number' && actual === 'integer'))) return true;
    report(path, `Expected type ${allowed.join('|')}, got ${actual}`);
    return false;
}

function checkObject(value: Record<string, unknown>, schema: JsonSchema, path: string, report: Report): void {
    for (const field of schema.required ?? []) {
        if (!(field in value)) report(`${path}.${field}`, 'Required field missing');
    }
    for (const [field, fieldSchema] of Object.entries(schema.properties ?? {})) {
        if (field in value) checkValue(value[field], fieldSchema, `${path}.${field}`, report);
    }
}

function checkArray(value: readonly unknown[], schema: JsonSchema, path: string, report: Report): void {
    if (schema.minItems !== undefined && value.length < schema.minItems) {
        report(path, `Expected at least ${schema.minItems} item(s), got ${value.length}`);
    }
    const itemSchema = schema.items;
    if (itemSchema) value.forEach((item, i) => checkValue(item, itemSchema, `${path}[${i}]`, report));
}

function checkString(value: string, schema: JsonSchema, path: string, report: Report): void {
    if (schema.minLength !== undefined && value.length < schema.minLength) {
        report(path, `Value shorter than ${schema.minLength} character(s)`);
    }
    if (schema.pattern && !new RegExp(schema.pattern).test(value)) {
        report(path, `Value does not match pattern: ${schema.pattern}`);
    }
}

function checkNumber(value: number, schema: JsonSchema, path: string, report: Report): void {
    if (schema.minimum !== undefined && value < schema.minimum) {
        report(path, `Value ${value} < minimum ${schema.minimum}`);
    }
    if (schema.maximum !== undefined && value > schema.maximum) {
        report(path, `Value ${value} > maximum ${schema.maximum}`);
    }
}

function checkValue(value: unknown, schema: JsonSchema, path: string, report: Report): void {
    if (!checkType(value, schema, path, report)) return;

    if (isRecord(value)) checkObject(value, schema, path, report);
    if (Array.isArray(value)) checkArray(value, schema, path, report);
    if (schema.enum && !schema.enum.some((option) => option === value)) {
        report(path, `Value must be one of: ${schema.enum.join(', ')}`);
    }
    if (typeof value === 'string') checkString(value, schema, path, report);
    if (typeof value === 'number') checkNumber(value, schema, path, report);
}

/* -------------------------------------------------------------------------- */
/* Registry                                                                   */
/* -------------------------------------------------------------------------- */

export class SchemaValidator {
    private readonly schemas = new Map<string, JsonSchema>();

    registerSchema(schemaId: string, schema: JsonSchema): void {
        this.schemas.set(schemaId, schema);
    }

    hasSchema(schemaId: string): boolean {
        return this.schemas.has(schemaId);
    }

    validate(value: unknown, schemaId: string): ValidationResult {
        const schema = this.schemas.get(schemaId);
        if (!schema) {
            return { valid: false, errors: [{ path: '', message: `Schema not found: ${schemaId}` }] };
        }

        const errors: ValidationError[] = [];
        checkValue(value, schema, '', (path, message) => errors.push({ path, message }));
        return { valid: errors.length === 0, errors };
    }
}

export function formatValidationErrors(errors: readonly ValidationError[]): string {
    return errors.map((e) => `${e.path || '<root>'}: ${e.message}`).join('; ');
}
