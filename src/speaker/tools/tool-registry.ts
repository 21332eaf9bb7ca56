/**
 * Tool Registry
 *
 * Holds the tools the model may call, builds them from the environment, and
 * executes calls by name. Tool failures come back as { error, tool } results
 * so a bad call never ends the conversation.
 */

import { createSubsystemLogger, describeError } from '../../logging/subsystem.js';
import type { EnvironmentRecord } from '../../config/environment.js';
import { ToolError } from '../errors.js';
import type { FunctionToolSchema } from '../types/index.js';
import type { BaseTool, ToolArguments, ToolErrorResult } from './base-tool.js';
import { resolveToolSettings, type ToolDefinition } from './tool-definition.js';

export class ToolRegistry {
  private readonly tools = new Map<string, BaseTool>();
  private readonly logger = createSubsystemLogger('speaker/tools');

  register(tool: BaseTool): void {
    if (this.tools.has(tool.name)) {
      this.logger.warn('Replacing already registered tool', { tool: tool.name });
    }
    this.tools.set(tool.name, tool);
    this.logger.info('Registered tool', { tool: tool.name });
  }

  /**
   * Builds and registers each definition; a definition that cannot be built
   * is logged and skipped. Returns the names registered.
   */
  registerDefinitions(definitions: readonly ToolDefinition[], env: EnvironmentRecord): string[] {
    const registered: string[] = [];

    for (const definition of definitions) {
      try {
        const settings = resolveToolSettings(definition, env);
        const tool = definition.create(settings);
        this.register(tool);
        registered.push(tool.name);
      } catch (error) {
        this.logger.warn(`Failed to initialize ${definition.id}`, describeError(error));
      }
    }

    return registered;
  }

  hasTool(name: string): boolean {
    return this.tools.has(name);
  }

  getTool(name: string): BaseTool {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new ToolError('TOOL_NOT_FOUND', `Tool '${name}' not found`, { tool: name });
    }
    return tool;
  }

  getToolHelp(name: string): string {
    return this.getTool(name).help;
  }

  getToolSchemas(): FunctionToolSchema[] {
    return [...this.tools.values()].map(tool => tool.getSchema());
  }

  listAvailableTools(): string[] {
    return [...this.tools.keys()];
  }

  get size(): number {
    return this.tools.size;
  }

  /**
   * Validates and runs a tool. Unknown names throw TOOL_NOT_FOUND; every
   * other failure is returned as an error result.
   */
  async executeTool(name: string, args: ToolArguments): Promise<unknown> {
    this.logger.info(`Looking for tool '${name}'`);
    const tool = this.getTool(name);

    try {
      const validated = tool.validateParameters(args);
      this.logger.debug(`Executing '${name}'`, { args });
      const result = await tool.execute(validated);
      this.logger.info(`Successfully executed '${name}'`);
      this.logger.debug('Execution result', { tool: name, result });
      return result;
    } catch (error) {
      this.logger.error(`Failed to execute '${name}'`, describeError(error));
      const failure: ToolErrorResult = tool.formatError(error);
      return failure;
    }
  }
}
