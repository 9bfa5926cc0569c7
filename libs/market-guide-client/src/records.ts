import { z } from 'zod';
import type { JsonValue } from '@libs/resilient-http-core';

/** Upstream fields a record does not declare, kept verbatim. */
export type Extensions = Record<string, unknown>;

export type RecordOf<Shape extends z.ZodRawShape> = z.objectOutputType<Shape, z.ZodTypeAny, 'strip'> & {
  extensions: Extensions;
};

export type RecordSchema<Shape extends z.ZodRawShape> = z.ZodType<RecordOf<Shape>, z.ZodTypeDef, unknown>;

/**
 * Wire names that cannot be used as field names, mapped to the name the
 * field carries in records. Only applied to records that declare the field.
 */
const WIRE_TO_FIELD: Readonly<Record<string, string>> = {
  from: 'rangeFrom',
};

const FIELD_TO_WIRE: Readonly<Record<string, string>> = Object.fromEntries(
  Object.entries(WIRE_TO_FIELD).map(([wire, field]) => [field, wire])
);

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function renameWireKeys(input: unknown, shape: z.ZodRawShape): unknown {
  if (!isPlainObject(input)) {
    return input;
  }
  const renamed: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(input)) {
    const field = WIRE_TO_FIELD[key];
    renamed[field !== undefined && field in shape ? field : key] = value;
  }
  return renamed;
}

/**
 * Structural schema for an upstream record. Declared fields are validated;
 * undeclared ones are moved into `extensions` untouched.
 */
export function record<Shape extends z.ZodRawShape>(shape: Shape): RecordSchema<Shape> {
  const fields = z.object(shape);
  return z.unknown().transform((input, ctx): RecordOf<Shape> => {
    const renamed = renameWireKeys(input, shape);
    const parsed = fields.safeParse(renamed);
    if (!parsed.success) {
      for (const issue of parsed.error.issues) {
        ctx.addIssue(issue);
      }
      return z.NEVER;
    }
    const extensions: Extensions = {};
    if (isPlainObject(renamed)) {
      for (const [key, value] of Object.entries(renamed)) {
        if (!(key in shape)) {
          extensions[key] = value;
        }
      }
    }
    return { ...parsed.data, extensions };
  });
}

/** Number or numeric string; upstream is not consistent about either. */
export const numeric = z.union([z.number(), z.string()]);

/** Optional and nullable: absent upstream values may arrive as null. */
export function opt<T extends z.ZodTypeAny>(schema: T) {
  return schema.nullish();
}

/** Array that defaults to empty when absent or null. */
export function list<T extends z.ZodTypeAny>(schema: T) {
  return z
    .array(schema)
    .nullish()
    .transform((items) => items ?? []);
}

function isEmptyObject(value: unknown): boolean {
  return isPlainObject(value) && Object.keys(value).length === 0;
}

/**
 * Top-level array payload. An empty body decodes to `{}`, which is read as an
 * empty list.
 */
export function listOf<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => (isEmptyObject(value) ? [] : value), z.array(schema));
}

function toJson(value: unknown): JsonValue | undefined {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (Array.isArray(value)) {
    return value.map((item) => toJson(item) ?? null);
  }
  if (isPlainObject(value)) {
    const out: { [key: string]: JsonValue } = {};
    for (const [key, item] of Object.entries(value)) {
      const converted = toJson(item);
      if (converted !== undefined) {
        out[key] = converted;
      }
    }
    return out;
  }
  return undefined;
}

/**
 * Serializes a record (or anything containing records) back to its wire form:
 * renamed fields get their wire name back and extension fields are emitted
 * at the level they were found.
 */
export function toWire(value: unknown): JsonValue {
  if (Array.isArray(value)) {
    return value.map((item) => toWire(item));
  }
  if (!isPlainObject(value)) {
    return toJson(value) ?? null;
  }
  const out: { [key: string]: JsonValue } = {};
  for (const [key, item] of Object.entries(value)) {
    if (key === 'extensions' && isPlainObject(item)) {
      continue;
    }
    if (item !== undefined) {
      out[FIELD_TO_WIRE[key] ?? key] = toWire(item);
    }
  }
  const extensions = value.extensions;
  if (isPlainObject(extensions)) {
    for (const [key, item] of Object.entries(extensions)) {
      const converted = toJson(item);
      if (converted !== undefined) {
        out[key] = converted;
      }
    }
  }
  return out;
}
