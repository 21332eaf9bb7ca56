/**
 * Speaker Orchestrator
 *
 * Wires the push-to-talk speaker together: input detection, the button, the
 * command dispatcher, microphone and speaker audio, the realtime client, the
 * tool registry and the voice session. Component events are recorded as
 * system events with a bounded history.
 */

import { EventEmitter } from 'node:events';
import { createSubsystemLogger, describeError } from '../logging/subsystem.js';
import type { EnvironmentRecord } from '../config/environment.js';
import { AudioCapture } from './audio/audio-capture.js';
import { AudioPlayer } from './audio/audio-player.js';
import { spawnAudioProcess, type AudioProcessFactory, type PcmFormat } from './audio/audio-process.js';
import type { ButtonInput } from './button/button-input.js';
import { GpioButton } from './button/gpio-button.js';
import { KeyboardButton } from './button/keyboard-button.js';
import { AsyncQueue } from './dispatcher/async-queue.js';
import { CommandDispatcher } from './dispatcher/command-dispatcher.js';
import { errorMessage } from './errors.js';
import { resolveInputKind } from './hardware/pi-detection.js';
import { RealtimeClient, type RealtimeCloseInfo } from './realtime/realtime-client.js';
import { createWebSocketTransport, type RealtimeTransportFactory } from './realtime/transport.js';
import { VoiceSession, type StateChange, type ToolCallRecord } from './session/voice-session.js';
import { createDefaultToolRegistry } from './tools/default-tools.js';
import type { ToolRegistry } from './tools/tool-registry.js';
import type { ButtonMode, InputKind, SpeakerCommand, SpeakerConfiguration, TranscriptEvent } from './types/index.js';

export interface SpeakerOrchestratorConfig {
  speaker: SpeakerConfiguration;
  /** Merged environment the tool settings are read from */
  env: EnvironmentRecord;
  eventHandling: {
    logAllEvents: boolean;
    maxEventHistory: number;
  };
}

/** Seams replaced in tests */
export interface SpeakerOrchestratorDependencies {
  spawnProcess: AudioProcessFactory;
  createTransport: RealtimeTransportFactory;
  createButton: (kind: InputKind, speaker: SpeakerConfiguration) => ButtonInput;
  detectInput: (speaker: SpeakerConfiguration) => InputKind;
  tools?: ToolRegistry;
}

export interface SpeakerStatus {
  running: boolean;
  inputKind?: InputKind;
  connected: boolean;
  sessionState: string;
  toolCount: number;
  uptime: number;
  eventCount: number;
}

export interface SpeakerSystemEvent {
  id: string;
  type: 'button' | 'session' | 'tool' | 'realtime' | 'audio' | 'system';
  subtype: string;
  severity: 'info' | 'warning' | 'critical';
  message: string;
  source: string;
  data: Record<string, unknown>;
  timestamp: Date;
}

export function createButton(kind: InputKind, speaker: SpeakerConfiguration, spawnProcess: AudioProcessFactory = spawnAudioProcess): ButtonInput {
  if (kind === 'keyboard') {
    return new KeyboardButton();
  }
  return new GpioButton(
    { chip: speaker.button.chip, pin: speaker.button.pin, bounceMs: speaker.button.bounceMs },
    spawnProcess,
  );
}

const REALTIME_SAMPLE_RATE = 24000;

export class SpeakerOrchestrator extends EventEmitter {
  private readonly config: SpeakerOrchestratorConfig;
  private readonly deps: SpeakerOrchestratorDependencies;
  private readonly logger = createSubsystemLogger('speaker/orchestrator');

  private tools?: ToolRegistry;
  private client?: RealtimeClient;
  private capture?: AudioCapture;
  private player?: AudioPlayer;
  private session?: VoiceSession;
  private button?: ButtonInput;
  private dispatcher?: CommandDispatcher<SpeakerCommand>;
  private commands?: AsyncQueue<SpeakerCommand>;
  private sessionCommands?: AsyncQueue<SpeakerCommand>;
  private sessionLoop?: Promise<void>;
  private inputKind?: InputKind;

  private isStarted = false;
  private isStopping = false;
  private startTime?: Date;
  private eventHistory: SpeakerSystemEvent[] = [];
  private eventCounter = 0;

  constructor(
    config: Pick<SpeakerOrchestratorConfig, 'speaker'> & Partial<SpeakerOrchestratorConfig>,
    deps: Partial<SpeakerOrchestratorDependencies> = {},
  ) {
    super();

    this.config = {
      env: {},
      ...config,
      eventHandling: {
        logAllEvents: true,
        maxEventHistory: 500,
        ...config.eventHandling,
      },
    };

    const spawnProcess = deps.spawnProcess ?? spawnAudioProcess;
    this.deps = {
      spawnProcess,
      createTransport: deps.createTransport ?? createWebSocketTransport,
      createButton: deps.createButton ?? ((kind, speaker) => createButton(kind, speaker, spawnProcess)),
      detectInput: deps.detectInput ?? resolveInputKind,
      tools: deps.tools,
    };
  }

  /**
   * Connects to the realtime API and starts listening for the button
   */
  async start(): Promise<void> {
    if (this.isStarted) {
      this.logger.warn('Speaker already started');
      return;
    }

    const { speaker } = this.config;

    try {
      this.logger.info('Starting speaker...');
      this.startTime = new Date();

      this.inputKind = this.deps.detectInput(speaker);
      this.tools = this.deps.tools ?? createDefaultToolRegistry(this.config.env);

      if (speaker.audio.sampleRate !== REALTIME_SAMPLE_RATE) {
        this.logger.warn('Realtime audio is 24 kHz pcm16; other sample rates will sound wrong', {
          sampleRate: speaker.audio.sampleRate,
        });
      }
      const format: PcmFormat = { sampleRate: speaker.audio.sampleRate, channels: 1, bitsPerSample: 16 };

      this.client = new RealtimeClient(
        {
          apiKey: speaker.realtime.apiKey,
          url: speaker.realtime.url,
          model: speaker.realtime.model,
          voice: speaker.realtime.voice,
          instructions: speaker.realtime.instructions,
          temperature: speaker.realtime.temperature,
          inputTranscriptionModel: speaker.realtime.transcriptionModel,
          tools: this.tools.getToolSchemas(),
        },
        this.deps.createTransport,
      );
      this.capture = new AudioCapture(
        { device: speaker.audio.inputDevice, format, recordingsDir: speaker.audio.recordingsDir },
        this.deps.spawnProcess,
      );
      this.player = new AudioPlayer({ device: speaker.audio.outputDevice, format }, this.deps.spawnProcess);
      this.session = new VoiceSession({
        client: this.client,
        capture: this.capture,
        player: this.player,
        tools: this.tools,
      });

      this.wireClientEvents(this.client);
      this.wireSessionEvents(this.session);
      this.session.attach();

      await this.client.connect();

      this.commands = new AsyncQueue();
      this.sessionCommands = new AsyncQueue();
      this.dispatcher = new CommandDispatcher(this.commands, [{ name: 'session', queue: this.sessionCommands }]);
      this.dispatcher.start();
      this.sessionLoop = this.session.consume(this.sessionCommands);

      this.button = this.deps.createButton(this.inputKind, speaker);
      this.wireButtonEvents(this.button, this.effectiveMode());
      this.button.start();

      this.isStarted = true;
      this.emitSystemEvent({
        type: 'system',
        subtype: 'speaker_started',
        severity: 'info',
        message: 'Speaker started successfully',
        source: 'orchestrator',
        data: { inputKind: this.inputKind, mode: this.effectiveMode(), tools: this.tools.listAvailableTools() },
      });
    } catch (error) {
      this.logger.error('Failed to start speaker', describeError(error));
      this.emitSystemEvent({
        type: 'system',
        subtype: 'speaker_error',
        severity: 'critical',
        message: `Failed to start speaker: ${errorMessage(error)}`,
        source: 'orchestrator',
        data: describeError(error),
      });
      await this.stopComponents();
      throw error;
    }
  }

  /**
   * Stops every component; a failing step is logged and the rest still run
   */
  async stop(): Promise<void> {
    if (!this.isStarted) {
      return;
    }

    this.logger.info('Stopping speaker...');
    await this.stopComponents();
    this.isStarted = false;

    this.emitSystemEvent({
      type: 'system',
      subtype: 'speaker_stopped',
      severity: 'info',
      message: 'Speaker stopped',
      source: 'orchestrator',
      data: { uptime: this.getUptime(), eventCount: this.eventCounter },
    });
  }

  /**
   * Queues a command as if it came from the button
   */
  submitCommand(command: SpeakerCommand): void {
    if (!this.commands || this.commands.isClosed()) {
      this.logger.warn('Speaker not running, dropping command', { command });
      return;
    }
    this.commands.put(command);
  }

  getStatus(): SpeakerStatus {
    return {
      running: this.isStarted,
      inputKind: this.inputKind,
      connected: this.client?.isConnected() ?? false,
      sessionState: this.session?.getState() ?? 'idle',
      toolCount: this.tools?.size ?? 0,
      uptime: this.getUptime(),
      eventCount: this.eventCounter,
    };
  }

  getRecentEvents(limit: number = 50): SpeakerSystemEvent[] {
    return this.eventHistory.slice(-limit);
  }

  /** Keyboard clicks have no release, so keyboard input always toggles */
  private effectiveMode(): ButtonMode {
    return this.inputKind === 'keyboard' ? 'toggle' : this.config.speaker.button.mode;
  }

  private async stopComponents(): Promise<void> {
    this.isStopping = true;

    const steps: Array<[string, () => void | Promise<void>]> = [
      ['button', () => this.button?.stop()],
      ['dispatcher', async () => {
        await this.dispatcher?.stop();
        this.sessionCommands?.close();
        await this.sessionLoop;
      }],
      ['session', () => this.session?.stop()],
      ['audio', () => {
        this.capture?.stop();
        this.player?.stopImmediately();
      }],
      ['realtime client', () => this.client?.close()],
    ];

    for (const [name, step] of steps) {
      try {
        await step();
      } catch (error) {
        this.logger.error(`Error stopping ${name}`, describeError(error));
      }
    }

    this.button?.removeAllListeners();
    this.isStopping = false;
  }

  private wireButtonEvents(button: ButtonInput, mode: ButtonMode): void {
    button.on('pressed', () => {
      this.emitSystemEvent({
        type: 'button',
        subtype: 'pressed',
        severity: 'info',
        message: 'Button pressed',
        source: button.kind,
        data: { mode },
      });
      this.submitCommand(mode === 'hold' ? 'startListening' : 'toggle');
    });

    button.on('released', () => {
      if (mode === 'hold') {
        this.submitCommand('stopListening');
      }
    });

    button.on('quit', () => {
      this.logger.info('Quit requested from keyboard');
      this.emit('quitRequested');
    });

    button.on('error', (error: Error) => {
      this.emitSystemEvent({
        type: 'button',
        subtype: 'button_error',
        severity: 'critical',
        message: `Button input failed: ${error.message}`,
        source: button.kind,
        data: describeError(error),
      });
    });
  }

  private wireClientEvents(client: RealtimeClient): void {
    client.on('sessionCreated', (sessionId: string | undefined) => {
      this.emitSystemEvent({
        type: 'realtime',
        subtype: 'session_created',
        severity: 'info',
        message: 'Realtime session created',
        source: 'realtime',
        data: { sessionId },
      });
    });

    client.on('error', (error: Error) => {
      this.emitSystemEvent({
        type: 'realtime',
        subtype: 'transport_error',
        severity: 'warning',
        message: error.message,
        source: 'realtime',
        data: describeError(error),
      });
    });

    client.on('close', (info: RealtimeCloseInfo) => {
      if (this.isStopping || !this.isStarted) return;
      this.emitSystemEvent({
        type: 'realtime',
        subtype: 'connection_lost',
        severity: 'critical',
        message: `Realtime connection closed (${info.code}${info.reason ? `: ${info.reason}` : ''})`,
        source: 'realtime',
        data: { ...info },
      });
      this.emit('disconnected', info);
    });
  }

  private wireSessionEvents(session: VoiceSession): void {
    session.on('stateChanged', (change: StateChange) => {
      this.emitSystemEvent({
        type: 'session',
        subtype: 'state_changed',
        severity: 'info',
        message: `Session ${change.from} → ${change.to}`,
        source: 'session',
        data: { ...change },
      });
    });

    session.on('toolCall', (record: ToolCallRecord) => {
      const failed = typeof record.result === 'object' && record.result !== null && 'error' in record.result;
      this.emitSystemEvent({
        type: 'tool',
        subtype: failed ? 'tool_failed' : 'tool_called',
        severity: failed ? 'warning' : 'info',
        message: `Tool ${record.name} ${failed ? 'failed' : 'completed'} in ${record.durationMs}ms`,
        source: 'tools',
        data: { callId: record.callId, name: record.name, args: record.args, durationMs: record.durationMs },
      });
    });

    session.on('transcript', (event: TranscriptEvent) => {
      this.emit('transcript', event);
    });
  }

  private emitSystemEvent(eventData: Omit<SpeakerSystemEvent, 'id' | 'timestamp'>): void {
    const event: SpeakerSystemEvent = {
      id: `${Date.now()}-${++this.eventCounter}`,
      timestamp: new Date(),
      ...eventData,
    };

    this.eventHistory.push(event);
    if (this.eventHistory.length > this.config.eventHandling.maxEventHistory) {
      this.eventHistory = this.eventHistory.slice(-this.config.eventHandling.maxEventHistory);
    }

    if (this.config.eventHandling.logAllEvents) {
      const data = { id: event.id, type: event.type, subtype: event.subtype, source: event.source };
      if (event.severity === 'critical') {
        this.logger.error(event.message, data);
      } else if (event.severity === 'warning') {
        this.logger.warn(event.message, data);
      } else {
        this.logger.debug(event.message, data);
      }
    }

    this.emit('systemEvent', event);
  }

  private getUptime(): number {
    return this.startTime ? Date.now() - this.startTime.getTime() : 0;
  }
}
