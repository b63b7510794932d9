/**
 * Schema Validator - structural checks for provider JSON output
 *
 * A deliberately small subset of JSON Schema: type (single or union), properties,
 * required, items, enum, pattern, minimum/maximum, minLength.
 */

export interface ValidationError {
    path: string;
    message: string;
}

export interface ValidationResult {
    valid: boolean;
    errors: ValidationError[];
}

export type JsonType = 'object' | 'array' | 'string' | 'number' | 'boolean' | 'null';

export interface JsonSchema {
    type: JsonType | JsonType[];
    properties?: Record<string, JsonSchema>;
    required?: string[];
    items?: JsonSchema;
    enum?: unknown[];
    pattern?: string;
    minimum?: number;
    maximum?: number;
    minLength?: number;
}

export class SchemaValidator {
    private schemas: Map<string, JsonSchema> = new Map();

    registerSchema(schemaId: string, schema: JsonSchema): void {
        this.schemas.set(schemaId, schema);
    }

    hasSchema(schemaId: string): boolean {
        return this.schemas.has(schemaId);
    }

    validate(artifact: unknown, schemaId: string): ValidationResult {
        const schema = this.schemas.get(schemaId);
        if (!schema) {
            return {
                valid: false,
                errors: [{ path: '', message: `Schema not found: ${schemaId}` }],
            };
        }

        const errors: ValidationError[] = [];
        this.validateValue(artifact, schema, '', errors);

        return {
            valid: errors.length === 0,
            errors,
        };
    }

    private validateValue(
        value: unknown,
        schema: JsonSchema,
        path: string,
        errors: ValidationError[]
    ): void {
        // Type validation
        const actualType = this.getType(value);
        const allowed = Array.isArray(schema.type) ? schema.type : [schema.type];
        if (!allowed.includes(actualType)) {
            errors.push({
                path,
                message: `Expected type ${allowed.join('|')}, got ${actualType}`,
            });
            return;
        }

        // Object validation
        if (actualType === 'object' && schema.properties && isPlainObject(value)) {
            if (schema.required) {
                for (const req of schema.required) {
                    if (value[req] === undefined) {
                        errors.push({ path: `${path}.${req}`, message: 'Required field missing' });
                    }
                }
            }

            for (const [key, propSchema] of Object.entries(schema.properties)) {
                // Undefined counts as absent, as in JSON.
                if (value[key] !== undefined) {
                    this.validateValue(value[key], propSchema, `${path}.${key}`, errors);
                }
            }
        }

        // Array validation
        if (schema.items && Array.isArray(value)) {
            for (let i = 0; i < value.length; i++) {
                this.validateValue(value[i], schema.items, `${path}[${i}]`, errors);
            }
        }

        // Enum validation
        if (schema.enum && !schema.enum.includes(value)) {
            errors.push({
                path,
                message: `Value must be one of: ${schema.enum.map(String).join(', ')}`,
            });
        }

        if (typeof value === 'string') {
            if (schema.pattern && !new RegExp(schema.pattern).test(value)) {
                errors.push({ path, message: `Value does not match pattern: ${schema.pattern}` });
            }
            if (schema.minLength !== undefined && value.length < schema.minLength) {
                errors.push({ path, message: `Length ${value.length} < minLength ${schema.minLength}` });
            }
        }

        // Number range validation
        if (typeof value === 'number') {
            if (schema.minimum !== undefined && value < schema.minimum) {
                errors.push({ path, message: `Value ${value} < minimum ${schema.minimum}` });
            }
            if (schema.maximum !== undefined && value > schema.maximum) {
                errors.push({ path, message: `Value ${value} > maximum ${schema.maximum}` });
            }
        }
    }

    private getType(value: unknown): JsonType {
        if (value === null) return 'null';
        if (Array.isArray(value)) return 'array';
        switch (typeof value) {
            case 'string': return 'string';
            case 'number': return 'number';
            case 'boolean': return 'boolean';
            default: return 'object';
        }
    }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return value !== null && typeof value === 'object' && !Array.isArray(value);
}
