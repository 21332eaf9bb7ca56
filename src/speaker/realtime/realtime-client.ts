/**
 * Realtime Client
 *
 * Connection to the realtime speech API. Sends microphone audio and tool
 * results, and re-emits validated server events for the voice session.
 *
 * Emitted events:
 *   sessionCreated (sessionId?), sessionUpdated
 *   audioDelta (Buffer), audioDone
 *   transcript (TranscriptEvent)
 *   responseCreated (responseId)
 *   functionCall (FunctionCallRequest)
 *   responseDone (ResponseSummary)
 *   serverError (RealtimeConnectionError)
 *   error (RealtimeConnectionError) for transport failures after connect
 *   close ({ code, reason })
 */

import { EventEmitter } from 'node:events';
import type { z } from 'zod';
import { createSubsystemLogger, describeError } from '../../logging/subsystem.js';
import { RealtimeConnectionError } from '../errors.js';
import type {
  FunctionCallRequest,
  FunctionToolSchema,
  RealtimeSessionSettings,
  ResponseSummary,
  TranscriptEvent,
} from '../types/index.js';
import {
  AUDIO_DONE_EVENTS,
  audioDeltaEventSchema,
  envelopeSchema,
  errorEventSchema,
  functionCallEventSchema,
  inputTranscriptEventSchema,
  responseCreatedEventSchema,
  responseDoneEventSchema,
  sessionEventSchema,
  transcriptDeltaEventSchema,
  transcriptDoneEventSchema,
} from './server-events.js';
import { createWebSocketTransport, type RealtimeTransport, type RealtimeTransportFactory } from './transport.js';

export interface RealtimeClientConfig {
  apiKey: string;
  url: string;
  model: string;
  voice: string;
  instructions: string;
  temperature: number;
  tools: FunctionToolSchema[];
  /** Transcribe the user's speech with this model; omit to skip */
  inputTranscriptionModel?: string;
  connectTimeoutMs: number;
  closeTimeoutMs: number;
}

export type RealtimeClientEvent =
  | { type: 'session.update'; session: Partial<RealtimeSessionSettings> }
  | { type: 'input_audio_buffer.append'; audio: string }
  | { type: 'input_audio_buffer.commit' }
  | { type: 'input_audio_buffer.clear' }
  | { type: 'response.create' }
  | { type: 'response.cancel' }
  | {
      type: 'conversation.item.create';
      item: { type: 'function_call_output'; call_id: string; output: string };
    };

export interface RealtimeCloseInfo {
  code: number;
  reason: string;
}

interface PendingConnect {
  resolve: () => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

export class RealtimeClient extends EventEmitter {
  private readonly config: RealtimeClientConfig;
  private readonly createTransport: RealtimeTransportFactory;
  private readonly logger = createSubsystemLogger('speaker/realtime');
  private transport?: RealtimeTransport;
  private connected = false;
  private pendingConnect?: PendingConnect;
  private sentEvents = 0;
  private receivedEvents = 0;

  constructor(
    config: Partial<RealtimeClientConfig> & Pick<RealtimeClientConfig, 'apiKey'>,
    createTransport: RealtimeTransportFactory = createWebSocketTransport,
  ) {
    super();
    this.config = {
      url: 'wss://api.openai.com/v1/realtime',
      model: 'gpt-4o-realtime-preview',
      voice: 'alloy',
      instructions: 'You are a helpful assistant',
      temperature: 0.8,
      tools: [],
      connectTimeoutMs: 15000,
      closeTimeoutMs: 2000,
      ...config,
    };
    this.createTransport = createTransport;
  }

  isConnected(): boolean {
    return this.connected;
  }

  getStats(): { sent: number; received: number } {
    return { sent: this.sentEvents, received: this.receivedEvents };
  }

  /**
   * Session settings sent on connect: push-to-talk (no server VAD), pcm16 in
   * and out, and every registered tool
   */
  buildSessionSettings(): RealtimeSessionSettings {
    const settings: RealtimeSessionSettings = {
      modalities: ['text', 'audio'],
      instructions: this.config.instructions,
      voice: this.config.voice,
      temperature: this.config.temperature,
      input_audio_format: 'pcm16',
      output_audio_format: 'pcm16',
      turn_detection: null,
      tools: this.config.tools.map(tool => ({ type: 'function' as const, ...tool })),
      tool_choice: 'auto',
    };
    if (this.config.inputTranscriptionModel) {
      settings.input_audio_transcription = { model: this.config.inputTranscriptionModel };
    }
    return settings;
  }

  async connect(): Promise<void> {
    if (this.transport) {
      this.logger.warn('Realtime client already connected');
      return;
    }

    const url = `${this.config.url}?model=${encodeURIComponent(this.config.model)}`;
    this.logger.info('Connecting to realtime API', { url, model: this.config.model });

    const transport = this.createTransport(url, {
      Authorization: `Bearer ${this.config.apiKey}`,
      'OpenAI-Beta': 'realtime=v1',
    });
    this.transport = transport;

    transport.on('message', (text: string) => this.handleMessage(text));
    transport.on('close', (code: number, reason: string) => this.handleClose(transport, code, reason));
    transport.on('error', (error: Error) => this.handleTransportError(error));

    try {
      await new Promise<void>((resolve, reject) => {
        const timer = setTimeout(() => {
          reject(new RealtimeConnectionError('REALTIME_CONNECT_FAILED', `Timed out connecting after ${this.config.connectTimeoutMs}ms`));
        }, this.config.connectTimeoutMs);
        this.pendingConnect = { resolve, reject, timer };
        transport.once('open', () => resolve());
      });
    } catch (error) {
      this.transport = undefined;
      transport.removeAllListeners('message');
      transport.close();
      this.logger.error('Failed to connect to realtime API', describeError(error));
      throw error;
    } finally {
      if (this.pendingConnect) {
        clearTimeout(this.pendingConnect.timer);
        this.pendingConnect = undefined;
      }
    }

    this.connected = true;
    this.logger.info('Connected to realtime API', { tools: this.config.tools.map(t => t.name) });
    this.send({ type: 'session.update', session: this.buildSessionSettings() });
  }

  updateSession(session: Partial<RealtimeSessionSettings>): void {
    this.send({ type: 'session.update', session });
  }

  appendAudio(pcm: Buffer): void {
    if (pcm.length === 0) return;
    this.send({ type: 'input_audio_buffer.append', audio: pcm.toString('base64') });
  }

  commitAudio(): void {
    this.send({ type: 'input_audio_buffer.commit' });
  }

  clearAudio(): void {
    this.send({ type: 'input_audio_buffer.clear' });
  }

  createResponse(): void {
    this.send({ type: 'response.create' });
  }

  cancelResponse(): void {
    this.send({ type: 'response.cancel' });
  }

  sendFunctionOutput(callId: string, output: unknown): void {
    this.send({
      type: 'conversation.item.create',
      item: { type: 'function_call_output', call_id: callId, output: JSON.stringify(output) },
    });
  }

  send(event: RealtimeClientEvent): void {
    if (!this.connected || !this.transport) {
      throw new RealtimeConnectionError('REALTIME_NOT_CONNECTED', `Cannot send ${event.type}: realtime client is not connected`);
    }
    this.transport.send(JSON.stringify(event));
    this.sentEvents++;
    if (event.type !== 'input_audio_buffer.append') {
      this.logger.debug('Sent event', { type: event.type });
    }
  }

  /**
   * Closes the connection; resolves once the transport reports closed
   */
  async close(): Promise<void> {
    const transport = this.transport;
    if (!transport) {
      return;
    }

    this.logger.info('Closing realtime connection');
    await new Promise<void>(resolve => {
      const timer = setTimeout(() => {
        this.logger.warn('Transport did not confirm close, forcing', { timeoutMs: this.config.closeTimeoutMs });
        this.handleClose(transport, 1006, 'close timeout');
      }, this.config.closeTimeoutMs);
      this.once('close', () => {
        clearTimeout(timer);
        resolve();
      });
      transport.close(1000, 'client closing');
    });
  }

  private handleTransportError(error: Error): void {
    if (this.pendingConnect) {
      this.pendingConnect.reject(new RealtimeConnectionError('REALTIME_CONNECT_FAILED', `Failed to connect: ${error.message}`));
      return;
    }
    this.logger.error('Realtime transport error', describeError(error));
    if (this.listenerCount('error') > 0) {
      this.emit('error', new RealtimeConnectionError('REALTIME_SERVER_ERROR', `Transport error: ${error.message}`));
    }
  }

  private handleClose(transport: RealtimeTransport, code: number, reason: string): void {
    if (this.transport !== transport) {
      return;
    }
    this.transport = undefined;
    this.connected = false;
    transport.removeAllListeners('message');
    transport.removeAllListeners('close');
    this.logger.info('Connection closed', { code, reason });
    const info: RealtimeCloseInfo = { code, reason };
    this.emit('close', info);
  }

  private handleMessage(text: string): void {
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      this.logger.warn('Dropping malformed server message', { ...describeError(error), length: text.length });
      return;
    }

    const envelope = envelopeSchema.safeParse(raw);
    if (!envelope.success) {
      this.logger.warn('Dropping server message without a type');
      return;
    }

    this.receivedEvents++;
    this.dispatchServerEvent(envelope.data.type, raw);
  }

  private parse<T extends z.ZodTypeAny>(schema: T, raw: unknown, type: string): z.infer<T> | undefined {
    const result = schema.safeParse(raw);
    if (!result.success) {
      this.logger.warn('Dropping invalid server event', {
        type,
        issues: result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
      });
      return undefined;
    }
    return result.data;
  }

  private dispatchServerEvent(type: string, raw: unknown): void {
    switch (type) {
      case 'session.created':
      case 'session.updated': {
        const event = this.parse(sessionEventSchema, raw, type);
        if (!event) return;
        this.logger.debug('Session event', { type, sessionId: event.session.id });
        this.emit(type === 'session.created' ? 'sessionCreated' : 'sessionUpdated', event.session.id);
        return;
      }

      case 'error': {
        const event = this.parse(errorEventSchema, raw, type);
        if (!event) return;
        this.logger.error('Server reported an error', {
          message: event.error.message,
          type: event.error.type,
          code: event.error.code ?? undefined,
        });
        this.emit('serverError', new RealtimeConnectionError('REALTIME_SERVER_ERROR', event.error.message, {
          type: event.error.type,
          code: event.error.code ?? undefined,
        }));
        return;
      }

      case 'response.audio.delta':
      case 'response.output_audio.delta': {
        const event = this.parse(audioDeltaEventSchema, raw, type);
        if (!event) return;
        this.emit('audioDelta', Buffer.from(event.delta, 'base64'));
        return;
      }

      case 'response.audio_transcript.delta':
      case 'response.output_audio_transcript.delta': {
        const event = this.parse(transcriptDeltaEventSchema, raw, type);
        if (!event) return;
        const transcript: TranscriptEvent = { role: 'assistant', text: event.delta, final: false };
        this.emit('transcript', transcript);
        return;
      }

      case 'response.audio_transcript.done':
      case 'response.output_audio_transcript.done': {
        const event = this.parse(transcriptDoneEventSchema, raw, type);
        if (!event) return;
        const transcript: TranscriptEvent = { role: 'assistant', text: event.transcript, final: true };
        this.emit('transcript', transcript);
        return;
      }

      case 'conversation.item.input_audio_transcription.completed': {
        const event = this.parse(inputTranscriptEventSchema, raw, type);
        if (!event) return;
        const transcript: TranscriptEvent = { role: 'user', text: event.transcript, final: true };
        this.emit('transcript', transcript);
        return;
      }

      case 'response.function_call_arguments.done': {
        const event = this.parse(functionCallEventSchema, raw, type);
        if (!event) return;
        const call: FunctionCallRequest = {
          callId: event.call_id,
          name: event.name,
          arguments: event.arguments,
          responseId: event.response_id,
        };
        this.logger.info('Model requested a function call', { name: call.name, callId: call.callId });
        this.emit('functionCall', call);
        return;
      }

      case 'response.created': {
        const event = this.parse(responseCreatedEventSchema, raw, type);
        if (!event) return;
        this.emit('responseCreated', event.response.id);
        return;
      }

      case 'response.done': {
        const event = this.parse(responseDoneEventSchema, raw, type);
        if (!event) return;
        const summary: ResponseSummary = {
          responseId: event.response.id,
          status: event.response.status,
          functionCalls: (event.response.output ?? []).filter(item => item.type === 'function_call').length,
        };
        this.logger.debug('Response done', { ...summary });
        this.emit('responseDone', summary);
        return;
      }

      default:
        if (AUDIO_DONE_EVENTS.has(type)) {
          this.emit('audioDone');
          return;
        }
        this.logger.debug('Ignoring server event', { type });
    }
  }
}
