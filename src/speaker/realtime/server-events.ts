/**
 * Realtime Server Events
 *
 * zod schemas for the server events the speaker acts on. Each event is
 * validated against its own schema after the envelope's `type` is read.
 * Both the beta event names (response.audio.*) and the GA names
 * (response.output_audio.*) are accepted.
 */

import { z } from 'zod';

export const envelopeSchema = z.object({
  type: z.string(),
  event_id: z.string().optional(),
});

export const errorEventSchema = z.object({
  type: z.literal('error'),
  error: z.object({
    message: z.string(),
    type: z.string().optional(),
    code: z.string().nullable().optional(),
    event_id: z.string().nullable().optional(),
  }),
});

export const sessionEventSchema = z.object({
  type: z.enum(['session.created', 'session.updated']),
  session: z.object({ id: z.string().optional() }).passthrough(),
});

export const audioDeltaEventSchema = z.object({
  type: z.enum(['response.audio.delta', 'response.output_audio.delta']),
  response_id: z.string().optional(),
  item_id: z.string().optional(),
  delta: z.string(),
});

export const transcriptDeltaEventSchema = z.object({
  type: z.enum(['response.audio_transcript.delta', 'response.output_audio_transcript.delta']),
  delta: z.string(),
});

export const transcriptDoneEventSchema = z.object({
  type: z.enum(['response.audio_transcript.done', 'response.output_audio_transcript.done']),
  transcript: z.string(),
});

export const inputTranscriptEventSchema = z.object({
  type: z.literal('conversation.item.input_audio_transcription.completed'),
  transcript: z.string(),
});

export const functionCallEventSchema = z.object({
  type: z.literal('response.function_call_arguments.done'),
  call_id: z.string(),
  name: z.string(),
  arguments: z.string(),
  response_id: z.string().optional(),
});

export const responseCreatedEventSchema = z.object({
  type: z.literal('response.created'),
  response: z.object({ id: z.string() }).passthrough(),
});

export const responseDoneEventSchema = z.object({
  type: z.literal('response.done'),
  response: z.object({
    id: z.string().optional(),
    status: z.string(),
    output: z.array(z.object({ type: z.string() }).passthrough()).optional(),
  }),
});

export const AUDIO_DONE_EVENTS: ReadonlySet<string> = new Set(['response.audio.done', 'response.output_audio.done']);
