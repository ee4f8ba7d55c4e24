import { z } from 'zod';

// ============================================
// DECLARATIVE PARAMETER CONSTRAINTS
// ============================================

interface BaseParam {
  description: string;
  required?: boolean;
}

export interface StringParam extends BaseParam {
  kind: 'string';
  minLength?: number;
  maxLength?: number;
}

export interface BooleanParam extends BaseParam {
  kind: 'boolean';
  default?: boolean;
}

export interface IntegerParam extends BaseParam {
  kind: 'integer';
  min?: number;
  max?: number;
  default?: number;
}

export interface DateParam extends BaseParam {
  kind: 'date';
  /** Accept an explicit null (meaning "clear the value"). */
  nullable?: boolean;
}

/** Trello position: "top", "bottom" or a positive number. */
export interface PositionParam extends BaseParam {
  kind: 'position';
}

export interface StringArrayParam extends BaseParam {
  kind: 'string[]';
  maxItems?: number;
}

export interface EnumParam extends BaseParam {
  kind: 'enum';
  values: readonly [string, ...string[]];
}

export interface ObjectParam extends BaseParam {
  kind: 'object';
  properties: Record<string, ParamSpec>;
}

export type ParamSpec =
  | StringParam
  | BooleanParam
  | IntegerParam
  | DateParam
  | PositionParam
  | StringArrayParam
  | EnumParam
  | ObjectParam;

export type ParamTable = Record<string, ParamSpec>;

// Trello rejects names above this length
export const MAX_NAME_LENGTH = 16384;

const ISO_DATE = /^\d{4}-\d{2}-\d{2}(T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?)?$/;

export function isIsoDate(value: string): boolean {
  return ISO_DATE.test(value) && !isNaN(Date.parse(value));
}

// ============================================
// ZOD COMPILATION
// ============================================

function compileParam(spec: ParamSpec): z.ZodTypeAny {
  let schema: z.ZodTypeAny;

  switch (spec.kind) {
    case 'string': {
      let str = z.string().trim();
      if (spec.minLength !== undefined) {
        str = str.min(spec.minLength, spec.minLength === 1 ? 'must not be empty' : `must be at least ${spec.minLength} characters`);
      }
      if (spec.maxLength !== undefined) {
        str = str.max(spec.maxLength, `must be at most ${spec.maxLength} characters`);
      }
      schema = str;
      break;
    }
    case 'boolean':
      schema = spec.default !== undefined ? z.boolean().default(spec.default) : z.boolean();
      break;
    case 'integer': {
      let num = z.number().int('must be an integer');
      if (spec.min !== undefined) num = num.min(spec.min, `must be >= ${spec.min}`);
      if (spec.max !== undefined) num = num.max(spec.max, `must be <= ${spec.max}`);
      schema = spec.default !== undefined ? num.default(spec.default) : num;
      break;
    }
    case 'date': {
      const date = z.string().trim().refine(isIsoDate, 'must be an ISO-8601 date (e.g. 2024-01-01T12:00:00Z)');
      schema = spec.nullable ? date.nullable() : date;
      break;
    }
    case 'position':
      schema = z.union([z.enum(['top', 'bottom']), z.number().positive()], {
        errorMap: () => ({ message: 'must be "top", "bottom" or a positive number' }),
      });
      break;
    case 'string[]': {
      const arr = z.array(z.string().trim().min(1, 'must not contain empty strings'));
      schema = spec.maxItems !== undefined ? arr.max(spec.maxItems, `must have at most ${spec.maxItems} items`) : arr;
      break;
    }
    case 'enum':
      schema = z.enum(spec.values);
      break;
    case 'object':
      schema = compileTable(spec.properties);
      break;
  }

  const hasDefault = (spec.kind === 'boolean' || spec.kind === 'integer') && spec.default !== undefined;
  return spec.required || hasDefault ? schema : schema.optional();
}

/** Builds the validator for a parameter table. Unknown keys are dropped. */
export function compileTable(table: ParamTable): z.ZodObject<z.ZodRawShape> {
  const shape: z.ZodRawShape = {};
  for (const [name, spec] of Object.entries(table)) {
    shape[name] = compileParam(spec);
  }
  return z.object(shape);
}

// ============================================
// JSON SCHEMA (advertised in tools/list)
// ============================================

export type JsonSchemaObject = {
  type: 'object';
  properties: Record<string, Record<string, unknown>>;
  required?: string[];
  anyOf?: Array<{ required: string[] }>;
};

function paramToJsonSchema(spec: ParamSpec): Record<string, unknown> {
  const base = { description: spec.description };

  switch (spec.kind) {
    case 'string':
      return { ...base, type: 'string', minLength: spec.minLength, maxLength: spec.maxLength };
    case 'boolean':
      return { ...base, type: 'boolean', default: spec.default };
    case 'integer':
      return { ...base, type: 'integer', minimum: spec.min, maximum: spec.max, default: spec.default };
    case 'date':
      return { ...base, type: spec.nullable ? ['string', 'null'] : 'string', format: 'date-time' };
    case 'position':
      return {
        ...base,
        oneOf: [
          { type: 'string', enum: ['top', 'bottom'] },
          { type: 'number', exclusiveMinimum: 0 },
        ],
      };
    case 'string[]':
      return { ...base, type: 'array', items: { type: 'string' }, maxItems: spec.maxItems };
    case 'enum':
      return { ...base, type: 'string', enum: [...spec.values] };
    case 'object':
      return { ...base, ...tableToJsonSchema(spec.properties) };
  }
}

function dropUndefined(value: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(value).filter(([, v]) => v !== undefined));
}

export function tableToJsonSchema(table: ParamTable, requireOneOf?: readonly string[]): JsonSchemaObject {
  const properties: Record<string, Record<string, unknown>> = {};
  const required: string[] = [];

  for (const [name, spec] of Object.entries(table)) {
    properties[name] = dropUndefined(paramToJsonSchema(spec));
    if (spec.required) required.push(name);
  }

  const schema: JsonSchemaObject = { type: 'object', properties };
  if (required.length > 0) schema.required = required;
  if (requireOneOf && requireOneOf.length > 0) {
    schema.anyOf = requireOneOf.map((name) => ({ required: [name] }));
  }
  return schema;
}
