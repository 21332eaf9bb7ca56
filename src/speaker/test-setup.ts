/**
 * Test Setup for the Speaker
 *
 * In-process stand-ins for child processes and the realtime transport, plus
 * fast-check generators shared by the property tests.
 */

import { EventEmitter } from 'node:events';
import { PassThrough } from 'node:stream';
import * as fc from 'fast-check';
import type { AudioProcess, AudioProcessFactory, PcmFormat } from './audio/audio-process.js';
import type { RealtimeTransport, RealtimeTransportFactory } from './realtime/transport.js';
import { BaseTool, type ToolArguments } from './tools/base-tool.js';
import type { ToolParameterSchema } from './types/index.js';

/**
 * Waits for pending stream and timer callbacks to run
 */
export function flush(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}

export class FakeAudioProcess extends EventEmitter implements AudioProcess {
  readonly stdout = new PassThrough();
  readonly stdin = new PassThrough();
  readonly stderr = new PassThrough();
  readonly written: Buffer[] = [];
  killedWith?: NodeJS.Signals;
  stdinEnded = false;
  exited = false;

  constructor(readonly command: string, readonly args: readonly string[]) {
    super();
    this.stdin.on('data', (chunk: Buffer) => this.written.push(chunk));
    this.stdin.on('finish', () => {
      this.stdinEnded = true;
      setImmediate(() => this.exit(0));
    });
  }

  get writtenBytes(): Buffer {
    return Buffer.concat(this.written);
  }

  kill(signal: NodeJS.Signals = 'SIGTERM'): boolean {
    this.killedWith = signal;
    setImmediate(() => this.exit(null, signal));
    return true;
  }

  exit(code: number | null, signal: NodeJS.Signals | null = null): void {
    if (this.exited) return;
    this.exited = true;
    this.emit('exit', code, signal);
  }
}

export function createFakeProcessFactory(): { factory: AudioProcessFactory; processes: FakeAudioProcess[] } {
  const processes: FakeAudioProcess[] = [];
  const factory: AudioProcessFactory = (command, args) => {
    const child = new FakeAudioProcess(command, args);
    processes.push(child);
    return child;
  };
  return { factory, processes };
}

export class FakeRealtimeTransport extends EventEmitter implements RealtimeTransport {
  readonly sent: string[] = [];
  closed = false;

  constructor(readonly url: string, readonly headers: Record<string, string>) {
    super();
  }

  /** Client events sent so far, parsed */
  get sentEvents(): Array<Record<string, unknown>> {
    return this.sent.map(text => JSON.parse(text));
  }

  sentTypes(): string[] {
    return this.sentEvents.map(event => String(event.type));
  }

  send(data: string): void {
    this.sent.push(data);
  }

  close(code = 1000, reason = ''): void {
    this.closed = true;
    setImmediate(() => this.emit('close', code, reason));
  }

  open(): void {
    this.emit('open');
  }

  receive(event: Record<string, unknown>): void {
    this.emit('message', JSON.stringify(event));
  }
}

export function createFakeTransportFactory(options: { autoOpen?: boolean } = {}): {
  factory: RealtimeTransportFactory;
  transports: FakeRealtimeTransport[];
} {
  const transports: FakeRealtimeTransport[] = [];
  const factory: RealtimeTransportFactory = (url, headers) => {
    const transport = new FakeRealtimeTransport(url, headers);
    transports.push(transport);
    if (options.autoOpen ?? true) {
      setImmediate(() => transport.open());
    }
    return transport;
  };
  return { factory, transports };
}

export type EchoArguments = { text: string; times?: number; mode?: string };

/**
 * Repeats its text argument; fails on demand with text 'fail'
 */
export class EchoTool extends BaseTool<EchoArguments, { echo: string }> {
  readonly name = 'echo';
  readonly description = 'Repeats text.';
  readonly parameters: ToolParameterSchema = {
    type: 'object',
    properties: {
      text: { type: 'string', description: 'Text to repeat' },
      times: { type: 'integer' },
      mode: { type: 'string', enum: ['loud', 'quiet'], description: 'Volume' },
    },
    required: ['text'],
  };

  protected narrowArguments(args: ToolArguments): EchoArguments {
    const narrowed: EchoArguments = { text: String(args.text) };
    if (typeof args.times === 'number') narrowed.times = args.times;
    if (typeof args.mode === 'string') narrowed.mode = args.mode;
    return narrowed;
  }

  async execute(args: EchoArguments): Promise<{ echo: string }> {
    if (args.text === 'fail') {
      throw new Error('echo failed');
    }
    const echo = Array.from({ length: args.times ?? 1 }, () => args.text).join(' ');
    return { echo: args.mode === 'loud' ? echo.toUpperCase() : echo };
  }
}

/**
 * Fast-check generators
 */

export const pcmFormatArbitrary: fc.Arbitrary<PcmFormat> = fc.record({
  sampleRate: fc.constantFrom(8000, 16000, 22050, 24000, 44100, 48000),
  channels: fc.constantFrom(1, 2),
  bitsPerSample: fc.constant(16),
});

/** Whole 16-bit frames of PCM for the given channel count */
export function pcmArbitrary(channels: number): fc.Arbitrary<Buffer> {
  return fc
    .array(fc.integer({ min: -32768, max: 32767 }), { maxLength: 512 })
    .map(samples => samples.slice(0, samples.length - (samples.length % channels)))
    .map(samples => {
      const buffer = Buffer.alloc(samples.length * 2);
      samples.forEach((sample, index) => buffer.writeInt16LE(sample, index * 2));
      return buffer;
    });
}

/** Button edge timelines: gaps in ms between alternating falling/rising edges */
export const edgeGapsArbitrary: fc.Arbitrary<number[]> = fc.array(fc.integer({ min: 0, max: 400 }), {
  minLength: 1,
  maxLength: 40,
});

export const propertyTestConfig = {
  numRuns: 50,
};
