/**
 * Environment Configuration Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadEnvironment, loadSpeakerConfiguration, parseSpeakerConfiguration } from './environment.js';
import { ConfigurationError } from '../speaker/errors.js';

vi.mock('../logging/subsystem.js', () => ({
  createSubsystemLogger: vi.fn(() => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    debug: vi.fn(),
  })),
}));

describe('environment configuration', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'speaker-env-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe('loadEnvironment', () => {
    it('prefers .env.local over .env', () => {
      writeFileSync(join(dir, '.env.local'), 'OPENAI_API_KEY="local-key"\n');
      writeFileSync(join(dir, '.env'), 'OPENAI_API_KEY="plain-key"\nOPENWEATHERMAP_API_KEY="weather-key"\n');

      const env = loadEnvironment({ cwd: dir, env: {} });

      expect(env.OPENAI_API_KEY).toBe('local-key');
      expect(env.OPENWEATHERMAP_API_KEY).toBe('weather-key');
    });

    it('keeps values from the base environment', () => {
      writeFileSync(join(dir, '.env'), 'SPEAKER_VOICE=shimmer\n');

      const env = loadEnvironment({ cwd: dir, env: { SPEAKER_VOICE: 'echo' } });

      expect(env.SPEAKER_VOICE).toBe('echo');
    });

    it('fills blank base values from the file', () => {
      writeFileSync(join(dir, '.env'), 'OPENAI_API_KEY=file-key\n');

      const env = loadEnvironment({ cwd: dir, env: { OPENAI_API_KEY: '' } });

      expect(env.OPENAI_API_KEY).toBe('file-key');
    });

    it('works with no environment files present', () => {
      expect(loadEnvironment({ cwd: dir, env: { A: '1' } })).toEqual({ A: '1' });
    });
  });

  describe('parseSpeakerConfiguration', () => {
    it('applies defaults', () => {
      const config = parseSpeakerConfiguration({ OPENAI_API_KEY: 'test-key' });

      expect(config).toEqual({
        realtime: {
          apiKey: 'test-key',
          url: 'wss://api.openai.com/v1/realtime',
          model: 'gpt-4o-realtime-preview',
          voice: 'alloy',
          instructions: 'You are a helpful assistant',
          temperature: 0.8,
        },
        button: {
          pin: 17,
          mode: 'hold',
          bounceMs: 100,
          chip: 'gpiochip0',
          input: 'auto',
        },
        audio: {
          inputDevice: 'default',
          outputDevice: 'default',
          sampleRate: 24000,
          recordingsDir: undefined,
        },
        forceEnable: false,
      });
    });

    it('coerces numeric and boolean values', () => {
      const config = parseSpeakerConfiguration({
        OPENAI_API_KEY: 'test-key',
        SPEAKER_BUTTON_PIN: '27',
        SPEAKER_TEMPERATURE: '1.0',
        SPEAKER_FORCE_ENABLE: 'YES',
        SPEAKER_BUTTON_MODE: 'toggle',
        SPEAKER_INPUT: 'keyboard',
      });

      expect(config.button.pin).toBe(27);
      expect(config.realtime.temperature).toBe(1);
      expect(config.forceEnable).toBe(true);
      expect(config.button.mode).toBe('toggle');
      expect(config.button.input).toBe('keyboard');
    });

    it('treats blank values as unset', () => {
      const config = parseSpeakerConfiguration({ OPENAI_API_KEY: 'test-key', SPEAKER_BUTTON_PIN: '  ' });
      expect(config.button.pin).toBe(17);
    });

    it('rejects invalid values and names every offending key', () => {
      try {
        parseSpeakerConfiguration({ OPENAI_API_KEY: 'test-key', SPEAKER_BUTTON_PIN: '40', SPEAKER_BUTTON_MODE: 'tap' });
        expect.unreachable('expected a configuration error');
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigurationError);
        const configError = error as ConfigurationError;
        expect(configError.code).toBe('CONFIG_INVALID');
        expect(configError.context.keys).toEqual(['SPEAKER_BUTTON_PIN', 'SPEAKER_BUTTON_MODE']);
      }
    });

    it('requires the API key unless told otherwise', () => {
      expect(() => parseSpeakerConfiguration({})).toThrow('OPENAI_API_KEY is not set');
      expect(parseSpeakerConfiguration({}, { requireApiKey: false }).realtime.apiKey).toBe('');
    });
  });

  it('loads and parses in one step', () => {
    writeFileSync(join(dir, '.env'), 'OPENAI_API_KEY="test-key"\nWEATHERTOOL_DEFAULT_UNITS=C\n');

    const loaded = loadSpeakerConfiguration({ cwd: dir, env: {} });

    expect(loaded.speaker.realtime.apiKey).toBe('test-key');
    expect(loaded.env.WEATHERTOOL_DEFAULT_UNITS).toBe('C');
  });
});
