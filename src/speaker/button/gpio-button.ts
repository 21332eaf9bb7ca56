/**
 * GPIO Button
 *
 * Watches the push-to-talk button with libgpiod's gpiomon. The line is biased
 * pull-up, so the button is active-low.
 */

import { EventEmitter } from 'node:events';
import { createInterface, type Interface } from 'node:readline';
import { createSubsystemLogger, describeError } from '../../logging/subsystem.js';
import { spawnAudioProcess, type AudioProcess, type AudioProcessFactory } from '../audio/audio-process.js';
import { AudioDeviceError } from '../errors.js';
import { ButtonDebouncer, type ButtonInput, type EdgeEvent } from './button-input.js';

export interface GpioButtonConfig {
  chip: string;
  /** BCM line offset */
  pin: number;
  bounceMs: number;
  command: string;
}

const EDGE_TOKENS: Record<string, EdgeEvent['edge']> = {
  '0': 'falling',
  '1': 'rising',
  '2': 'falling',
  falling: 'falling',
  rising: 'rising',
};

/**
 * Parses one line of gpiomon output. Accepts the `%e %s %n` format and the
 * default "event: FALLING EDGE offset: 17 timestamp: [sec.nsec]" output.
 */
export function parseGpiomonLine(line: string): EdgeEvent | null {
  const trimmed = line.trim();

  const formatted = /^(\S+)\s+(\d+)\s+(\d+)$/.exec(trimmed);
  if (formatted) {
    const edge = EDGE_TOKENS[formatted[1].toLowerCase()];
    if (!edge) return null;
    return { edge, timestampMs: toMillis(formatted[2], formatted[3]) };
  }

  const verbose = /(RISING|FALLING) EDGE.*\[\s*(\d+)\.(\d+)\]/i.exec(trimmed);
  if (verbose) {
    return {
      edge: verbose[1].toUpperCase() === 'FALLING' ? 'falling' : 'rising',
      timestampMs: toMillis(verbose[2], verbose[3]),
    };
  }

  return null;
}

function toMillis(seconds: string, nanoseconds: string): number {
  return Number(seconds) * 1000 + Number(nanoseconds.padEnd(9, '0').slice(0, 9)) / 1_000_000;
}

export class GpioButton extends EventEmitter implements ButtonInput {
  readonly kind = 'gpio' as const;
  private readonly config: GpioButtonConfig;
  private readonly spawnProcess: AudioProcessFactory;
  private readonly debouncer: ButtonDebouncer;
  private readonly logger = createSubsystemLogger('speaker/button');
  private process?: AudioProcess;
  private lines?: Interface;
  private active = false;

  constructor(config: Partial<GpioButtonConfig> = {}, spawnProcess: AudioProcessFactory = spawnAudioProcess) {
    super();
    this.config = {
      chip: 'gpiochip0',
      pin: 17,
      bounceMs: 100,
      command: 'gpiomon',
      ...config,
    };
    this.spawnProcess = spawnProcess;
    this.debouncer = new ButtonDebouncer(this.config.bounceMs);
  }

  gpiomonArgs(): string[] {
    return ['-B', 'pull-up', '-F', '%e %s %n', this.config.chip, String(this.config.pin)];
  }

  isActive(): boolean {
    return this.active;
  }

  start(): void {
    if (this.active) {
      this.logger.warn('Button already started');
      return;
    }

    let child: AudioProcess;
    try {
      child = this.spawnProcess(this.config.command, this.gpiomonArgs());
    } catch (error) {
      throw new AudioDeviceError('AUDIO_SPAWN_FAILED', `Failed to start ${this.config.command}`, describeError(error));
    }

    this.process = child;
    this.active = true;
    this.debouncer.reset();

    this.lines = createInterface({ input: child.stdout });
    this.lines.on('line', line => this.handleLine(line));

    child.stderr.on('data', (chunk: Buffer) => {
      this.logger.warn('gpiomon stderr', { output: chunk.toString('utf8').trim() });
    });

    child.on('error', error => {
      this.logger.error('gpiomon process error', describeError(error));
      this.emit('error', new AudioDeviceError('AUDIO_SPAWN_FAILED', `${this.config.command} failed: ${error.message}`));
    });

    child.on('exit', (code, signal) => {
      if (this.process !== child || !this.active) return;
      this.active = false;
      this.process = undefined;
      this.logger.error('gpiomon exited while watching the button', { code, signal });
      this.emit('error', new AudioDeviceError('AUDIO_PROCESS_EXITED', `${this.config.command} exited unexpectedly`, { code, signal }));
    });

    this.logger.info('Button initialized', {
      chip: this.config.chip,
      pin: this.config.pin,
      bounceMs: this.config.bounceMs,
    });
  }

  stop(): void {
    if (!this.active) return;
    this.active = false;
    this.lines?.close();
    this.lines = undefined;
    const child = this.process;
    this.process = undefined;
    child?.kill('SIGTERM');
    this.logger.info('Button stopped');
  }

  private handleLine(line: string): void {
    if (!this.active) return;

    const event = parseGpiomonLine(line);
    if (!event) {
      this.logger.debug('Ignoring gpiomon output', { line });
      return;
    }

    const transition = this.debouncer.accept(event);
    if (transition) {
      this.logger.debug(`Button ${transition}`, { timestampMs: event.timestampMs });
      this.emit(transition);
    }
  }
}
