/**
 * Audio Capture
 *
 * Records 16-bit mono PCM from the microphone through ALSA's arecord,
 * streaming each chunk as it arrives and returning the full utterance as WAV
 * when recording stops.
 */

import { EventEmitter } from 'node:events';
import { mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { createSubsystemLogger, describeError } from '../../logging/subsystem.js';
import { AudioDeviceError } from '../errors.js';
import {
  alsaRawArgs,
  spawnAudioProcess,
  REALTIME_PCM_FORMAT,
  type AudioProcess,
  type AudioProcessFactory,
  type PcmFormat,
} from './audio-process.js';
import { encodeWav, pcmDurationMs } from './wav.js';

export interface AudioCaptureConfig {
  device: string;
  format: PcmFormat;
  /** Directory each stopped recording is saved to, if any */
  recordingsDir?: string;
  command: string;
}

export interface CapturedUtterance {
  wav: Buffer;
  byteLength: number;
  durationMs: number;
  savedTo?: string;
}

export class AudioCapture extends EventEmitter {
  private readonly config: AudioCaptureConfig;
  private readonly spawnProcess: AudioProcessFactory;
  private readonly logger = createSubsystemLogger('speaker/audio-capture');
  private process?: AudioProcess;
  private frames: Buffer[] = [];
  private recording = false;

  constructor(config: Partial<AudioCaptureConfig> = {}, spawnProcess: AudioProcessFactory = spawnAudioProcess) {
    super();
    this.config = {
      device: 'default',
      format: REALTIME_PCM_FORMAT,
      command: 'arecord',
      ...config,
    };
    this.spawnProcess = spawnProcess;
  }

  isRecording(): boolean {
    return this.recording;
  }

  start(): void {
    if (this.recording) {
      this.logger.warn('Already recording');
      return;
    }

    const args = alsaRawArgs(this.config.format, this.config.device);
    let child: AudioProcess;
    try {
      child = this.spawnProcess(this.config.command, args);
    } catch (error) {
      throw new AudioDeviceError('AUDIO_SPAWN_FAILED', `Failed to start ${this.config.command}`, describeError(error));
    }

    this.frames = [];
    this.process = child;
    this.recording = true;

    child.stdout.on('data', (chunk: Buffer) => {
      if (!this.recording || this.process !== child) return;
      this.frames.push(chunk);
      this.emit('chunk', chunk);
    });

    child.stderr.on('data', (chunk: Buffer) => {
      this.logger.debug('arecord stderr', { output: chunk.toString('utf8').trim() });
    });

    child.on('error', error => {
      this.logger.error('Capture process error', describeError(error));
      this.emit('error', new AudioDeviceError('AUDIO_SPAWN_FAILED', `${this.config.command} failed: ${error.message}`));
    });

    child.on('exit', (code, signal) => {
      if (this.process !== child) return;
      if (this.recording) {
        this.recording = false;
        this.process = undefined;
        this.logger.error('Capture process exited while recording', { code, signal });
        this.emit('error', new AudioDeviceError('AUDIO_PROCESS_EXITED', `${this.config.command} exited unexpectedly`, { code, signal }));
      }
    });

    this.logger.info('Recording started', { device: this.config.device, sampleRate: this.config.format.sampleRate });
    this.emit('recordingStarted');
  }

  /**
   * Stops recording and returns the utterance as WAV, or null when idle
   */
  stop(): CapturedUtterance | null {
    if (!this.recording) {
      return null;
    }

    this.recording = false;
    const child = this.process;
    this.process = undefined;
    child?.kill('SIGTERM');

    const pcm = Buffer.concat(this.frames);
    this.frames = [];

    const utterance: CapturedUtterance = {
      wav: encodeWav(pcm, this.config.format),
      byteLength: pcm.length,
      durationMs: pcmDurationMs(pcm.length, this.config.format),
    };

    if (this.config.recordingsDir) {
      utterance.savedTo = this.saveRecording(utterance.wav);
    }

    this.logger.info('Recording stopped', { bytes: utterance.byteLength, durationMs: utterance.durationMs });
    this.emit('recordingStopped', utterance);
    return utterance;
  }

  private saveRecording(wav: Buffer): string | undefined {
    const dir = this.config.recordingsDir;
    if (!dir) return undefined;

    try {
      mkdirSync(dir, { recursive: true });
      const path = join(dir, `utterance-${new Date().toISOString().replace(/[:.]/g, '-')}.wav`);
      writeFileSync(path, wav);
      this.logger.debug('Recording saved', { path });
      return path;
    } catch (error) {
      this.logger.warn('Failed to save recording', { dir, ...describeError(error) });
      return undefined;
    }
  }
}
