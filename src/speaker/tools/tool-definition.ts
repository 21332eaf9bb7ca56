/**
 * Tool Definitions
 *
 * A definition describes how to build a tool from the environment. Settings
 * are read from `<ID>_<SETTING>` (e.g. WEATHERTOOL_API_KEY), then from an
 * optional fallback variable, then from the declared default.
 */

import { createSubsystemLogger } from '../../logging/subsystem.js';
import type { EnvironmentRecord } from '../../config/environment.js';
import type { BaseTool } from './base-tool.js';

const log = createSubsystemLogger('speaker/tool-settings');

export type Coordinates = readonly [latitude: number, longitude: number];

export type ToolSettingValue = string | number | boolean | Coordinates;

export type ToolSettingSpec =
  | { type: 'string'; default?: string; fallbackEnv?: string; required?: boolean }
  | { type: 'number'; default?: number; fallbackEnv?: string; required?: boolean }
  | { type: 'boolean'; default?: boolean; fallbackEnv?: string; required?: boolean }
  | { type: 'coordinates'; default?: Coordinates; fallbackEnv?: string; required?: boolean };

export type ToolSettings = Record<string, ToolSettingValue | undefined>;

export interface ToolDefinition {
  /** Identifier used as the environment prefix, e.g. 'WeatherTool' */
  id: string;
  settings: Record<string, ToolSettingSpec>;
  create(settings: ToolSettings): BaseTool;
}

/** apiKey → API_KEY, defaultLocation → DEFAULT_LOCATION */
export function settingEnvName(toolId: string, setting: string): string {
  const snake = setting.replace(/([a-z0-9])([A-Z])/g, '$1_$2');
  return `${toolId}_${snake}`.toUpperCase();
}

export function convertSetting(spec: ToolSettingSpec, raw: string): ToolSettingValue | undefined {
  switch (spec.type) {
    case 'string':
      return raw;
    case 'number': {
      const value = Number(raw);
      return Number.isFinite(value) ? value : undefined;
    }
    case 'boolean':
      return ['true', '1', 'yes'].includes(raw.trim().toLowerCase());
    case 'coordinates': {
      const parts = raw.split(',').map(part => Number(part.trim()));
      if (parts.length !== 2 || parts.some(part => !Number.isFinite(part))) {
        return undefined;
      }
      return [parts[0], parts[1]];
    }
  }
}

export class MissingToolSettingError extends Error {
  constructor(readonly envName: string) {
    super(`Missing required setting ${envName}`);
    this.name = 'MissingToolSettingError';
  }
}

export function resolveToolSettings(definition: ToolDefinition, env: EnvironmentRecord): ToolSettings {
  const settings: ToolSettings = {};

  for (const [name, spec] of Object.entries(definition.settings)) {
    const envName = settingEnvName(definition.id, name);
    const fromEnv = env[envName]?.trim() || (spec.fallbackEnv ? env[spec.fallbackEnv]?.trim() : undefined) || undefined;

    let value: ToolSettingValue | undefined = spec.default;
    if (fromEnv !== undefined) {
      const converted = convertSetting(spec, fromEnv);
      if (converted === undefined) {
        log.warn(`Could not convert ${envName} to ${spec.type}, using default`, { value: fromEnv });
      } else {
        value = converted;
      }
    }

    if (value === undefined && spec.required) {
      throw new MissingToolSettingError(envName);
    }
    settings[name] = value;
  }

  return settings;
}
