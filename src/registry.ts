import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { compileTable, tableToJsonSchema } from './schemas.js';
import { COMMON_PARAMETERS, TOOL_CATALOG, type ToolDescriptor } from './tools.js';

export interface FieldError {
  field: string;
  message: string;
}

export type ValidationResult =
  | { ok: true; value: Record<string, unknown> }
  | { ok: false; missingFields: string[]; typeErrors: FieldError[] };

interface RegisteredTool {
  descriptor: ToolDescriptor;
  schema: z.ZodObject<z.ZodRawShape>;
  definition: Tool;
}

function toDefinition(descriptor: ToolDescriptor): Tool {
  return {
    name: descriptor.name,
    description: descriptor.description,
    inputSchema: tableToJsonSchema(
      { ...descriptor.parameters, ...COMMON_PARAMETERS },
      descriptor.requireOneOf
    ),
    annotations: { ...descriptor.annotations },
  };
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

/**
 * Immutable catalog of the tools this server exposes, with one compiled
 * validator per tool.
 */
export class ToolRegistry {
  private readonly tools: ReadonlyMap<string, RegisteredTool>;

  constructor(catalog: readonly ToolDescriptor[] = TOOL_CATALOG) {
    const tools = new Map<string, RegisteredTool>();
    for (const descriptor of catalog) {
      if (tools.has(descriptor.name)) {
        throw new Error(`Duplicate tool name: ${descriptor.name}`);
      }
      tools.set(descriptor.name, {
        descriptor: Object.freeze({ ...descriptor }),
        schema: compileTable(descriptor.parameters),
        definition: deepFreeze(toDefinition(descriptor)),
      });
    }
    this.tools = tools;
    Object.freeze(this);
  }

  describe(name: string): ToolDescriptor | undefined {
    return this.tools.get(name)?.descriptor;
  }

  list(): Tool[] {
    return Array.from(this.tools.values(), (tool) => tool.definition);
  }

  get size(): number {
    return this.tools.size;
  }

  validate(name: string, args: unknown): ValidationResult {
    const tool = this.tools.get(name);
    if (!tool) {
      return { ok: false, missingFields: [], typeErrors: [{ field: 'name', message: `unknown tool: ${name}` }] };
    }

    const result = tool.schema.safeParse(args);
    if (!result.success) {
      const missingFields: string[] = [];
      const typeErrors: FieldError[] = [];

      for (const issue of result.error.errors) {
        const field = issue.path.length > 0 ? issue.path.join('.') : 'arguments';
        if (issue.code === z.ZodIssueCode.invalid_type && issue.received === 'undefined') {
          missingFields.push(field);
        } else {
          typeErrors.push({ field, message: issue.message });
        }
      }
      return { ok: false, missingFields, typeErrors };
    }

    const { requireOneOf } = tool.descriptor;
    if (requireOneOf && !requireOneOf.some((field) => result.data[field] !== undefined)) {
      return { ok: false, missingFields: [requireOneOf.join(' or ')], typeErrors: [] };
    }

    return { ok: true, value: result.data };
  }
}
