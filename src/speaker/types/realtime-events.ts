/**
 * Realtime Session Types
 *
 * Shapes exchanged with the realtime speech API once server events have been
 * validated, plus the session settings sent on connect.
 */

/** JSON-Schema description of a callable function, as advertised to the model */
export interface FunctionToolSchema {
  name: string;
  description: string;
  parameters: ToolParameterSchema;
}

export type ToolParameterType = 'string' | 'number' | 'integer' | 'boolean' | 'array' | 'object';

export interface ToolParameterProperty {
  type: ToolParameterType;
  description?: string;
  enum?: readonly string[];
}

export interface ToolParameterSchema {
  type: 'object';
  properties: Record<string, ToolParameterProperty>;
  required?: readonly string[];
}

export interface RealtimeSessionSettings {
  modalities: Array<'text' | 'audio'>;
  instructions: string;
  voice: string;
  temperature: number;
  input_audio_format: 'pcm16';
  output_audio_format: 'pcm16';
  turn_detection: null;
  tools: Array<{ type: 'function' } & FunctionToolSchema>;
  tool_choice: 'auto' | 'none';
  input_audio_transcription?: { model: string } | null;
}

export interface FunctionCallRequest {
  callId: string;
  name: string;
  /** Raw JSON argument string as produced by the model */
  arguments: string;
  responseId?: string;
}

export interface ResponseSummary {
  responseId?: string;
  status: string;
  /** Number of function calls the model made in this response */
  functionCalls: number;
}

export interface TranscriptEvent {
  role: 'assistant' | 'user';
  text: string;
  final: boolean;
}
