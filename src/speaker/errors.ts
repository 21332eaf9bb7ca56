/**
 * Speaker Error Types
 *
 * Machine-readable error codes for every failure a speaker component can raise.
 */

export type SpeakerErrorCode =
  // Configuration
  | 'CONFIG_INVALID'
  | 'CONFIG_MISSING_KEY'

  // Realtime speech API
  | 'REALTIME_NOT_CONNECTED'
  | 'REALTIME_CONNECT_FAILED'
  | 'REALTIME_SERVER_ERROR'

  // Audio and GPIO child processes
  | 'AUDIO_SPAWN_FAILED'
  | 'AUDIO_PROCESS_EXITED'
  | 'AUDIO_INVALID_WAV'

  // Weather service
  | 'WEATHER_INVALID_KEY'
  | 'WEATHER_NOT_FOUND'
  | 'WEATHER_HTTP'
  | 'WEATHER_NETWORK'
  | 'WEATHER_TIMEOUT'
  | 'WEATHER_BAD_RESPONSE'

  // Tools
  | 'TOOL_NOT_FOUND'
  | 'TOOL_INVALID_PARAMETERS';

export class SpeakerError extends Error {
  readonly code: SpeakerErrorCode;
  readonly context: Record<string, unknown>;

  constructor(code: SpeakerErrorCode, message: string, context: Record<string, unknown> = {}) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.context = context;
  }
}

export class ConfigurationError extends SpeakerError {}

export class RealtimeConnectionError extends SpeakerError {}

export class AudioDeviceError extends SpeakerError {}

export class WeatherServiceError extends SpeakerError {}

export class ToolError extends SpeakerError {}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
