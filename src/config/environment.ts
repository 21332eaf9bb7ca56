/**
 * Environment Configuration
 *
 * Loads the environment file (.env.local, then .env) with dotenv and validates
 * the merged environment into a SpeakerConfiguration with zod. Values already
 * present in the process environment take precedence over file values.
 */

import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import dotenv from 'dotenv';
import { z } from 'zod';
import { createSubsystemLogger } from '../logging/subsystem.js';
import { ConfigurationError } from '../speaker/errors.js';
import type { SpeakerConfiguration } from '../speaker/types/index.js';

const log = createSubsystemLogger('config');

export type EnvironmentRecord = Record<string, string | undefined>;

export const ENV_FILES = ['.env.local', '.env'] as const;

export const DEFAULT_REALTIME_URL = 'wss://api.openai.com/v1/realtime';
export const DEFAULT_REALTIME_MODEL = 'gpt-4o-realtime-preview';

const envBoolean = z
  .string()
  .transform(value => ['true', '1', 'yes'].includes(value.toLowerCase()))
  .default('false');

const environmentSchema = z.object({
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_REALTIME_URL: z.string().url().default(DEFAULT_REALTIME_URL),
  OPENAI_REALTIME_MODEL: z.string().default(DEFAULT_REALTIME_MODEL),
  OPENAI_TRANSCRIPTION_MODEL: z.string().optional(),
  SPEAKER_VOICE: z.string().default('alloy'),
  SPEAKER_INSTRUCTIONS: z.string().default('You are a helpful assistant'),
  SPEAKER_TEMPERATURE: z.coerce.number().min(0.6).max(1.2).default(0.8),
  SPEAKER_BUTTON_PIN: z.coerce.number().int().min(0).max(27).default(17),
  SPEAKER_BUTTON_MODE: z.enum(['hold', 'toggle']).default('hold'),
  SPEAKER_BUTTON_BOUNCE_MS: z.coerce.number().int().min(0).default(100),
  SPEAKER_GPIO_CHIP: z.string().default('gpiochip0'),
  SPEAKER_INPUT: z.enum(['auto', 'gpio', 'keyboard']).default('auto'),
  SPEAKER_FORCE_ENABLE: envBoolean,
  SPEAKER_AUDIO_INPUT_DEVICE: z.string().default('default'),
  SPEAKER_AUDIO_OUTPUT_DEVICE: z.string().default('default'),
  SPEAKER_SAMPLE_RATE: z.coerce.number().int().positive().default(24000),
  SPEAKER_RECORDINGS_DIR: z.string().optional(),
});

export interface LoadEnvironmentOptions {
  /** Directory the environment files are looked up in (default: cwd) */
  cwd?: string;
  /** Base environment (default: process.env) */
  env?: EnvironmentRecord;
}

export interface ParseConfigurationOptions {
  /** Throw CONFIG_MISSING_KEY when OPENAI_API_KEY is absent (default: true) */
  requireApiKey?: boolean;
}

/**
 * Reads .env.local and .env (in that order) and merges them under the base
 * environment. The first definition of a key wins.
 */
export function loadEnvironment(options: LoadEnvironmentOptions = {}): EnvironmentRecord {
  const cwd = options.cwd ?? process.cwd();
  const merged: EnvironmentRecord = { ...(options.env ?? process.env) };

  for (const file of ENV_FILES) {
    const path = resolve(cwd, file);
    if (!existsSync(path)) continue;

    const parsed = dotenv.parse(readFileSync(path, 'utf8'));
    let applied = 0;
    for (const [key, value] of Object.entries(parsed)) {
      if (merged[key] === undefined || merged[key] === '') {
        merged[key] = value;
        applied++;
      }
    }
    log.debug('Loaded environment file', { file, keys: Object.keys(parsed).length, applied });
  }

  return merged;
}

/** Drops blank values so schema defaults apply to them. */
function withoutBlankValues(env: EnvironmentRecord): Record<string, string> {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      cleaned[key] = value.trim();
    }
  }
  return cleaned;
}

export function parseSpeakerConfiguration(
  env: EnvironmentRecord,
  options: ParseConfigurationOptions = {},
): SpeakerConfiguration {
  const result = environmentSchema.safeParse(withoutBlankValues(env));

  if (!result.success) {
    const problems = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError('CONFIG_INVALID', `Invalid configuration: ${problems.join('; ')}`, {
      keys: result.error.issues.map(issue => issue.path.join('.')),
    });
  }

  const values = result.data;
  const apiKey = values.OPENAI_API_KEY ?? '';

  if (!apiKey && (options.requireApiKey ?? true)) {
    throw new ConfigurationError(
      'CONFIG_MISSING_KEY',
      'OPENAI_API_KEY is not set. Copy .env.example to .env.local and add your key.',
      { key: 'OPENAI_API_KEY' },
    );
  }

  return {
    realtime: {
      apiKey,
      url: values.OPENAI_REALTIME_URL,
      model: values.OPENAI_REALTIME_MODEL,
      voice: values.SPEAKER_VOICE,
      instructions: values.SPEAKER_INSTRUCTIONS,
      temperature: values.SPEAKER_TEMPERATURE,
      transcriptionModel: values.OPENAI_TRANSCRIPTION_MODEL,
    },
    button: {
      pin: values.SPEAKER_BUTTON_PIN,
      mode: values.SPEAKER_BUTTON_MODE,
      bounceMs: values.SPEAKER_BUTTON_BOUNCE_MS,
      chip: values.SPEAKER_GPIO_CHIP,
      input: values.SPEAKER_INPUT,
    },
    audio: {
      inputDevice: values.SPEAKER_AUDIO_INPUT_DEVICE,
      outputDevice: values.SPEAKER_AUDIO_OUTPUT_DEVICE,
      sampleRate: values.SPEAKER_SAMPLE_RATE,
      recordingsDir: values.SPEAKER_RECORDINGS_DIR,
    },
    forceEnable: values.SPEAKER_FORCE_ENABLE,
  };
}

export interface LoadedConfiguration {
  speaker: SpeakerConfiguration;
  /** Merged environment, used to resolve per-tool settings */
  env: EnvironmentRecord;
}

export function loadSpeakerConfiguration(
  options: LoadEnvironmentOptions & ParseConfigurationOptions = {},
): LoadedConfiguration {
  const env = loadEnvironment(options);
  const speaker = parseSpeakerConfiguration(env, options);

  log.info('Configuration loaded', {
    model: speaker.realtime.model,
    voice: speaker.realtime.voice,
    input: speaker.button.input,
    buttonPin: speaker.button.pin,
    buttonMode: speaker.button.mode,
    sampleRate: speaker.audio.sampleRate,
  });

  return { speaker, env };
}
