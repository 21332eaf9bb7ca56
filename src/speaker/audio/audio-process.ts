/**
 * Audio Process Abstraction
 *
 * Capture, playback and GPIO monitoring run as child processes (arecord,
 * aplay, gpiomon). Components depend on this narrow shape so tests can
 * substitute an in-process fake.
 */

import { spawn } from 'node:child_process';
import type { Readable, Writable } from 'node:stream';

export interface AudioProcess {
  readonly stdout: Readable;
  readonly stdin: Writable;
  readonly stderr: Readable;
  kill(signal?: NodeJS.Signals): boolean;
  on(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
}

export type AudioProcessFactory = (command: string, args: readonly string[]) => AudioProcess;

export const spawnAudioProcess: AudioProcessFactory = (command, args) =>
  spawn(command, [...args], { stdio: ['pipe', 'pipe', 'pipe'] });

export interface PcmFormat {
  sampleRate: number;
  channels: number;
  bitsPerSample: number;
}

/** Format the realtime speech API uses for input and output audio */
export const REALTIME_PCM_FORMAT: PcmFormat = {
  sampleRate: 24000,
  channels: 1,
  bitsPerSample: 16,
};

/** ALSA arguments shared by arecord and aplay for raw little-endian PCM */
export function alsaRawArgs(format: PcmFormat, device: string): string[] {
  return [
    '-q',
    '-t', 'raw',
    '-f', `S${format.bitsPerSample}_LE`,
    '-r', String(format.sampleRate),
    '-c', String(format.channels),
    '-D', device,
  ];
}
