// src/core/schema/schemas.ts

import { z } from 'zod';

/**
 * Root schema kinds. Every API takes a parameters schema and returns a
 * response schema; both are plain zod objects tagged at declaration time so
 * registration can reject anything else.
 */
const parameterSchemas = new WeakSet<z.ZodTypeAny>();
const responseSchemas = new WeakSet<z.ZodTypeAny>();

export function defineParameters<T extends z.ZodRawShape>(shape: T) {
    const schema = z.object(shape);
    parameterSchemas.add(schema);
    return schema;
}

export function defineResponse<T extends z.ZodRawShape>(shape: T) {
    const schema = z.object(shape);
    responseSchemas.add(schema);
    return schema;
}

export function isParametersSchema(schema: z.ZodTypeAny): schema is z.AnyZodObject {
    return schema instanceof z.ZodObject && parameterSchemas.has(schema);
}

export function isResponseSchema(schema: z.ZodTypeAny): schema is z.AnyZodObject {
    return schema instanceof z.ZodObject && responseSchemas.has(schema);
}

/**
 * `path: message` pairs, comma separated.
 */
export function formatZodIssues(error: z.ZodError): string {
    return error.issues
        .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '<root>'}: ${issue.message}`)
        .join(', ');
}

export type FieldKind =
    | 'string'
    | 'integer'
    | 'number'
    | 'boolean'
    | 'bigint'
    | 'date'
    | 'array'
    | 'object'
    | 'map'
    | 'enum'
    | 'literal'
    | 'union'
    | 'unknown';

export interface FieldDescriptor {
    name: string;
    kind: FieldKind;
    optional: boolean;
    nullable: boolean;
}

interface Unwrapped {
    inner: z.ZodTypeAny;
    optional: boolean;
    nullable: boolean;
}

function unwrap(type: z.ZodTypeAny): Unwrapped {
    let inner = type;
    let optional = false;
    let nullable = false;

    for (;;) {
        if (inner instanceof z.ZodOptional) {
            optional = true;
            inner = inner.unwrap();
        } else if (inner instanceof z.ZodNullable) {
            nullable = true;
            inner = inner.unwrap();
        } else if (inner instanceof z.ZodDefault) {
            optional = true;
            inner = inner.removeDefault();
        } else if (inner instanceof z.ZodEffects) {
            inner = inner.innerType();
        } else {
            return { inner, optional, nullable };
        }
    }
}

function kindOf(type: z.ZodTypeAny): FieldKind {
    if (type instanceof z.ZodString) return 'string';
    if (type instanceof z.ZodNumber) return type.isInt ? 'integer' : 'number';
    if (type instanceof z.ZodBoolean) return 'boolean';
    if (type instanceof z.ZodBigInt) return 'bigint';
    if (type instanceof z.ZodDate) return 'date';
    if (type instanceof z.ZodArray) return 'array';
    if (type instanceof z.ZodObject) return 'object';
    if (type instanceof z.ZodRecord || type instanceof z.ZodMap) return 'map';
    if (type instanceof z.ZodEnum || type instanceof z.ZodNativeEnum) return 'enum';
    if (type instanceof z.ZodLiteral) return 'literal';
    if (type instanceof z.ZodUnion || type instanceof z.ZodDiscriminatedUnion) return 'union';
    return 'unknown';
}

/**
 * Field name to primitive kind, in declaration order.
 */
export function describeSchema(schema: z.AnyZodObject): FieldDescriptor[] {
    return Object.entries<z.ZodTypeAny>(schema.shape).map(([name, fieldType]) => {
        const { inner, optional, nullable } = unwrap(fieldType);
        return { name, kind: kindOf(inner), optional, nullable };
    });
}
