/**
 * Base Tool
 *
 * Every function the model can call extends BaseTool. The registry advertises
 * getSchema() to the realtime session and routes calls to execute().
 */

import { ToolError } from '../errors.js';
import type { FunctionToolSchema, ToolParameterSchema } from '../types/index.js';

export type ToolArguments = Record<string, unknown>;

export interface ToolErrorResult {
  error: string;
  tool: string;
}

export abstract class BaseTool<TArgs extends ToolArguments = ToolArguments, TResult = unknown> {
  /** Function name the model calls; unique across tools */
  abstract readonly name: string;

  /** Tells the model when to use the tool */
  abstract readonly description: string;

  abstract readonly parameters: ToolParameterSchema;

  abstract execute(args: TArgs): Promise<TResult>;

  /**
   * Checks arguments against the parameter schema and returns them typed.
   * Throws ToolError(TOOL_INVALID_PARAMETERS) on the first problem found.
   */
  validateParameters(args: ToolArguments): TArgs {
    const required = this.parameters.required ?? [];
    const properties = this.parameters.properties;

    for (const param of required) {
      if (!Object.hasOwn(args, param) || args[param] === undefined) {
        throw this.invalid(`Missing required parameter: ${param}`);
      }
    }

    for (const [param, value] of Object.entries(args)) {
      const property = Object.hasOwn(properties, param) ? properties[param] : undefined;
      if (!property) {
        throw this.invalid(`Unexpected parameter: ${param}`);
      }
      if (value === undefined || value === null) {
        continue;
      }

      switch (property.type) {
        case 'string':
          if (typeof value !== 'string') throw this.invalid(`Parameter ${param} must be a string`);
          break;
        case 'number':
          if (typeof value !== 'number' || Number.isNaN(value)) throw this.invalid(`Parameter ${param} must be a number`);
          break;
        case 'integer':
          if (!Number.isInteger(value)) throw this.invalid(`Parameter ${param} must be an integer`);
          break;
        case 'boolean':
          if (typeof value !== 'boolean') throw this.invalid(`Parameter ${param} must be a boolean`);
          break;
        case 'array':
          if (!Array.isArray(value)) throw this.invalid(`Parameter ${param} must be an array`);
          break;
        case 'object':
          if (typeof value !== 'object' || Array.isArray(value)) throw this.invalid(`Parameter ${param} must be an object`);
          break;
      }

      if (property.enum && !property.enum.includes(String(value))) {
        throw this.invalid(`Parameter ${param} must be one of ${property.enum.join(', ')}`);
      }
    }

    return this.narrowArguments(args);
  }

  /**
   * Maps validated arguments onto the tool's argument type
   */
  protected abstract narrowArguments(args: ToolArguments): TArgs;

  formatError(error: unknown): ToolErrorResult {
    return {
      error: error instanceof Error ? error.message : String(error),
      tool: this.name,
    };
  }

  getSchema(): FunctionToolSchema {
    return {
      name: this.name,
      description: this.description,
      parameters: this.parameters,
    };
  }

  get help(): string {
    const required = this.parameters.required ?? [];
    const lines = [`Tool: ${this.name}`, `Description: ${this.description}`, '', 'Parameters:'];

    for (const [param, info] of Object.entries(this.parameters.properties)) {
      const requirement = required.includes(param) ? '(required)' : '(optional)';
      lines.push(`  ${param} (${info.type}) ${requirement}: ${info.description ?? 'No description'}`);
    }

    return lines.join('\n');
  }

  private invalid(message: string): ToolError {
    return new ToolError('TOOL_INVALID_PARAMETERS', message, { tool: this.name });
  }
}
