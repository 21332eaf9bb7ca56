/**
 * Built-in tools
 */

import type { EnvironmentRecord } from '../../config/environment.js';
import { ToolRegistry } from './tool-registry.js';
import type { ToolDefinition } from './tool-definition.js';
import { weatherToolDefinition } from './weather/weather-tool.js';

export const BUILTIN_TOOL_DEFINITIONS: readonly ToolDefinition[] = [weatherToolDefinition];

export function createDefaultToolRegistry(
  env: EnvironmentRecord,
  definitions: readonly ToolDefinition[] = BUILTIN_TOOL_DEFINITIONS,
): ToolRegistry {
  const registry = new ToolRegistry();
  registry.registerDefinitions(definitions, env);
  return registry;
}
