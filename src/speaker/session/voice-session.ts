/**
 * Voice Session
 *
 * Push-to-talk conversation state machine:
 *
 *   idle → listening → thinking → speaking → idle
 *
 * Microphone chunks stream to the realtime API while listening. Response audio
 * plays as it arrives. Function calls run through the tool registry; their
 * outputs are sent back once every call of a response has finished, and a new
 * response is requested. Starting to talk while the assistant speaks cancels
 * the response and cuts playback (barge-in).
 */

import { EventEmitter } from 'node:events';
import { createSubsystemLogger, describeError } from '../../logging/subsystem.js';
import type { AudioCapture } from '../audio/audio-capture.js';
import type { AudioPlayer } from '../audio/audio-player.js';
import { QueueClosedError, type AsyncQueue } from '../dispatcher/async-queue.js';
import { errorMessage, type RealtimeConnectionError } from '../errors.js';
import type { RealtimeClient } from '../realtime/realtime-client.js';
import type { ToolArguments } from '../tools/base-tool.js';
import type { ToolRegistry } from '../tools/tool-registry.js';
import type {
  FunctionCallRequest,
  ResponseSummary,
  SpeakerCommand,
  TranscriptEvent,
} from '../types/index.js';

export type SessionState = 'idle' | 'listening' | 'thinking' | 'speaking';

export interface StateChange {
  from: SessionState;
  to: SessionState;
}

export interface ToolCallRecord {
  callId: string;
  name: string;
  args?: ToolArguments;
  result: unknown;
  durationMs: number;
}

export interface VoiceSessionConfig {
  /** Utterances shorter than this are discarded instead of committed */
  minUtteranceMs: number;
}

export interface VoiceSessionDependencies {
  client: RealtimeClient;
  capture: AudioCapture;
  player: AudioPlayer;
  tools: ToolRegistry;
}

interface PendingToolCall {
  callId: string;
  output: Promise<unknown>;
}

export interface VoiceSessionStats {
  state: SessionState;
  turns: number;
  toolCalls: number;
  interruptions: number;
}

export class VoiceSession extends EventEmitter {
  private readonly config: VoiceSessionConfig;
  private readonly client: RealtimeClient;
  private readonly capture: AudioCapture;
  private readonly player: AudioPlayer;
  private readonly tools: ToolRegistry;
  private readonly logger = createSubsystemLogger('speaker/session');

  private state: SessionState = 'idle';
  private responseInFlight = false;
  private sentAudioBytes = 0;
  /** Bumped on every interruption; work started under an older turn is dropped */
  private turn = 0;
  private pendingCalls: PendingToolCall[] = [];
  private currentResponseId?: string;
  /** Responses cancelled by barge-in whose response.done is still to come */
  private cancelledResponseIds = new Set<string>();
  /** Cancellations sent before the response id was known */
  private unidentifiedCancels = 0;
  private attached = false;
  private stats = { turns: 0, toolCalls: 0, interruptions: 0 };

  private readonly onChunk = (chunk: Buffer): void => this.handleChunk(chunk);
  private readonly onCaptureError = (error: Error): void => this.handleCaptureError(error);
  private readonly onAudioDelta = (pcm: Buffer): void => this.handleAudioDelta(pcm);
  private readonly onFunctionCall = (call: FunctionCallRequest): void => this.handleFunctionCall(call);
  private readonly onResponseDone = (summary: ResponseSummary): void => {
    this.handleResponseDone(summary).catch(error => {
      this.logger.error('Failed to complete response', describeError(error));
      this.setState('idle');
    });
  };
  private readonly onResponseCreated = (responseId: string): void => this.handleResponseCreated(responseId);
  private readonly onTranscript = (event: TranscriptEvent): void => this.handleTranscript(event);
  private readonly onServerError = (error: RealtimeConnectionError): void => this.handleServerError(error);
  private readonly onClientClose = (): void => this.handleClientClose();
  private readonly onPlayerError = (error: Error): void => {
    this.logger.error('Playback failed', describeError(error));
  };

  constructor(dependencies: VoiceSessionDependencies, config: Partial<VoiceSessionConfig> = {}) {
    super();
    this.client = dependencies.client;
    this.capture = dependencies.capture;
    this.player = dependencies.player;
    this.tools = dependencies.tools;
    this.config = { minUtteranceMs: 100, ...config };
  }

  getState(): SessionState {
    return this.state;
  }

  getStats(): VoiceSessionStats {
    return { state: this.state, ...this.stats };
  }

  /**
   * Subscribes to the client, capture and player events
   */
  attach(): void {
    if (this.attached) return;
    this.attached = true;
    this.capture.on('chunk', this.onChunk);
    this.capture.on('error', this.onCaptureError);
    this.player.on('error', this.onPlayerError);
    this.client.on('audioDelta', this.onAudioDelta);
    this.client.on('responseCreated', this.onResponseCreated);
    this.client.on('functionCall', this.onFunctionCall);
    this.client.on('responseDone', this.onResponseDone);
    this.client.on('transcript', this.onTranscript);
    this.client.on('serverError', this.onServerError);
    this.client.on('close', this.onClientClose);
  }

  detach(): void {
    if (!this.attached) return;
    this.attached = false;
    this.capture.off('chunk', this.onChunk);
    this.capture.off('error', this.onCaptureError);
    this.player.off('error', this.onPlayerError);
    this.client.off('audioDelta', this.onAudioDelta);
    this.client.off('responseCreated', this.onResponseCreated);
    this.client.off('functionCall', this.onFunctionCall);
    this.client.off('responseDone', this.onResponseDone);
    this.client.off('transcript', this.onTranscript);
    this.client.off('serverError', this.onServerError);
    this.client.off('close', this.onClientClose);
  }

  /**
   * Handles commands from the queue until it is closed
   */
  async consume(commands: AsyncQueue<SpeakerCommand>): Promise<void> {
    for (;;) {
      let command: SpeakerCommand;
      try {
        command = await commands.get();
      } catch (error) {
        if (!(error instanceof QueueClosedError)) {
          this.logger.error('Command queue failed', describeError(error));
        }
        return;
      }
      this.handleCommand(command);
    }
  }

  handleCommand(command: SpeakerCommand): void {
    this.logger.debug('Command received', { command, state: this.state });
    try {
      switch (command) {
        case 'startListening':
          this.startListening();
          break;
        case 'stopListening':
          this.stopListening();
          break;
        case 'toggle':
          if (this.state === 'listening') {
            this.stopListening();
          } else {
            this.startListening();
          }
          break;
        case 'stopPlayback':
          this.stopPlayback();
          break;
      }
    } catch (error) {
      this.logger.error(`Command '${command}' failed`, describeError(error));
      this.capture.stop();
      this.responseInFlight = false;
      this.setState('idle');
    }
  }

  startListening(): void {
    if (this.state === 'listening') {
      this.logger.debug('Already listening');
      return;
    }

    if (this.state !== 'idle') {
      this.interrupt();
    }

    this.client.clearAudio();
    this.sentAudioBytes = 0;
    this.capture.start();
    this.stats.turns++;
    this.setState('listening');
  }

  stopListening(): void {
    if (this.state !== 'listening') {
      this.logger.debug('Not listening', { state: this.state });
      return;
    }

    const utterance = this.capture.stop();
    const durationMs = utterance?.durationMs ?? 0;

    if (this.sentAudioBytes === 0 || durationMs < this.config.minUtteranceMs) {
      this.logger.info('Recording too short, discarding', { durationMs, bytes: this.sentAudioBytes });
      this.client.clearAudio();
      this.setState('idle');
      return;
    }

    this.client.commitAudio();
    this.client.createResponse();
    this.responseInFlight = true;
    this.logger.info('Utterance sent', { durationMs, bytes: this.sentAudioBytes });
    this.setState('thinking');
  }

  stopPlayback(): void {
    if (this.state === 'thinking' || this.state === 'speaking') {
      this.interrupt();
      this.setState('idle');
    } else {
      this.player.stopImmediately();
    }
  }

  /**
   * Stops capture and playback and detaches from all sources
   */
  stop(): void {
    if (this.state === 'listening') {
      this.capture.stop();
    }
    this.player.stopImmediately();
    if (this.responseInFlight && this.client.isConnected()) {
      this.client.cancelResponse();
    }
    this.responseInFlight = false;
    this.pendingCalls = [];
    this.currentResponseId = undefined;
    this.cancelledResponseIds.clear();
    this.unidentifiedCancels = 0;
    this.turn++;
    this.detach();
    this.setState('idle');
  }

  private interrupt(): void {
    this.turn++;
    this.stats.interruptions++;
    this.pendingCalls = [];
    this.player.stopImmediately();
    if (this.responseInFlight) {
      this.client.cancelResponse();
      this.responseInFlight = false;
      if (this.currentResponseId) {
        this.cancelledResponseIds.add(this.currentResponseId);
      } else {
        this.unidentifiedCancels++;
      }
    }
    this.currentResponseId = undefined;
    this.logger.info('Response interrupted', { from: this.state });
  }

  private handleChunk(chunk: Buffer): void {
    if (this.state !== 'listening') return;
    try {
      this.client.appendAudio(chunk);
      this.sentAudioBytes += chunk.length;
    } catch (error) {
      this.logger.warn('Dropping microphone audio', describeError(error));
    }
  }

  private handleCaptureError(error: Error): void {
    this.logger.error('Microphone capture failed', describeError(error));
    if (this.state === 'listening') {
      this.setState('idle');
    }
  }

  private handleAudioDelta(pcm: Buffer): void {
    if (this.state !== 'thinking' && this.state !== 'speaking') {
      return;
    }
    this.player.write(pcm);
    this.setState('speaking');
  }

  private handleFunctionCall(call: FunctionCallRequest): void {
    if (this.state !== 'thinking' && this.state !== 'speaking') {
      this.logger.debug('Ignoring function call outside a response', { name: call.name });
      return;
    }
    this.pendingCalls.push({ callId: call.callId, output: this.runTool(call) });
  }

  private async runTool(call: FunctionCallRequest): Promise<unknown> {
    const started = Date.now();
    const args = parseToolArguments(call.arguments);
    let result: unknown;

    if (!args) {
      result = { error: `Invalid arguments for ${call.name}: expected a JSON object`, tool: call.name };
    } else {
      try {
        result = await this.tools.executeTool(call.name, args);
      } catch (error) {
        result = { error: errorMessage(error), tool: call.name };
      }
    }

    const record: ToolCallRecord = {
      callId: call.callId,
      name: call.name,
      args: args ?? undefined,
      result,
      durationMs: Date.now() - started,
    };
    this.stats.toolCalls++;
    this.logger.info('Tool call finished', { name: call.name, durationMs: record.durationMs });
    this.emit('toolCall', record);
    return result;
  }

  private handleResponseCreated(responseId: string): void {
    if (this.responseInFlight) {
      this.currentResponseId = responseId;
    }
  }

  /** True for a response.done that belongs to a response cancelled by barge-in */
  private isStaleResponse(summary: ResponseSummary): boolean {
    if (summary.responseId !== undefined && this.cancelledResponseIds.delete(summary.responseId)) {
      return true;
    }
    if (summary.status === 'cancelled' && this.unidentifiedCancels > 0) {
      this.unidentifiedCancels--;
      return true;
    }
    return (
      summary.responseId !== undefined &&
      this.currentResponseId !== undefined &&
      summary.responseId !== this.currentResponseId
    );
  }

  private async handleResponseDone(summary: ResponseSummary): Promise<void> {
    if (this.isStaleResponse(summary)) {
      this.logger.debug('Ignoring response.done of a cancelled response', { ...summary });
      return;
    }

    const turn = this.turn;
    this.responseInFlight = false;
    this.currentResponseId = undefined;

    if (this.state !== 'thinking' && this.state !== 'speaking') {
      return;
    }

    if (this.pendingCalls.length > 0) {
      const calls = this.pendingCalls;
      this.pendingCalls = [];
      const outputs = await Promise.all(calls.map(call => call.output));
      if (turn !== this.turn) {
        this.logger.debug('Dropping tool outputs from an interrupted turn');
        return;
      }
      calls.forEach((call, index) => this.client.sendFunctionOutput(call.callId, outputs[index]));
      this.client.createResponse();
      this.responseInFlight = true;
      if (this.state !== 'speaking') {
        this.setState('thinking');
      }
      return;
    }

    const playback = await this.player.finish();
    if (turn !== this.turn) {
      return;
    }
    this.logger.info('Response finished', { status: summary.status, bytesPlayed: playback.bytesWritten });
    this.setState('idle');
  }

  private handleTranscript(event: TranscriptEvent): void {
    if (event.final) {
      this.logger.info(event.role === 'user' ? 'You said' : 'Assistant said', { text: event.text });
    }
    this.emit('transcript', event);
  }

  private handleServerError(error: RealtimeConnectionError): void {
    this.logger.warn('Realtime API error', { message: error.message, ...error.context });
    if (this.state === 'thinking') {
      this.responseInFlight = false;
      this.pendingCalls = [];
      this.setState('idle');
    }
  }

  private handleClientClose(): void {
    this.logger.warn('Realtime connection closed during session', { state: this.state });
    if (this.state === 'listening') {
      this.capture.stop();
    }
    this.player.stopImmediately();
    this.responseInFlight = false;
    this.pendingCalls = [];
    this.currentResponseId = undefined;
    this.cancelledResponseIds.clear();
    this.unidentifiedCancels = 0;
    this.turn++;
    this.setState('idle');
  }

  private setState(next: SessionState): void {
    if (next === this.state) return;
    const change: StateChange = { from: this.state, to: next };
    this.state = next;
    this.logger.debug('State changed', { ...change });
    this.emit('stateChanged', change);
  }
}

/**
 * Parses the model's JSON argument string; null unless it is an object
 */
export function parseToolArguments(raw: string): ToolArguments | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw === '' ? '{}' : raw);
  } catch {
    return null;
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return null;
  }
  return Object.fromEntries(Object.entries(parsed));
}
