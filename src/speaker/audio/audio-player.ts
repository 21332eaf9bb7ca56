/**
 * Audio Player
 *
 * Streams 16-bit mono PCM to the speaker through ALSA's aplay. Response audio
 * arrives in deltas, so playback starts on the first write and ends when the
 * response is finished or interrupted.
 */

import { EventEmitter } from 'node:events';
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
import { decodeWav } from './wav.js';

export interface AudioPlayerConfig {
  device: string;
  format: PcmFormat;
  command: string;
}

export interface PlaybackResult {
  bytesWritten: number;
  interrupted: boolean;
}

interface ActivePlayback {
  process: AudioProcess;
  bytesWritten: number;
  interrupted: boolean;
  exited: Promise<void>;
}

export class AudioPlayer extends EventEmitter {
  private readonly config: AudioPlayerConfig;
  private readonly spawnProcess: AudioProcessFactory;
  private readonly logger = createSubsystemLogger('speaker/audio-player');
  private active?: ActivePlayback;

  constructor(config: Partial<AudioPlayerConfig> = {}, spawnProcess: AudioProcessFactory = spawnAudioProcess) {
    super();
    this.config = {
      device: 'default',
      format: REALTIME_PCM_FORMAT,
      command: 'aplay',
      ...config,
    };
    this.spawnProcess = spawnProcess;
  }

  isPlaying(): boolean {
    return this.active !== undefined;
  }

  /**
   * Queues PCM for playback, starting the player process if needed
   */
  write(pcm: Buffer): void {
    if (pcm.length === 0) return;

    const playback = this.active ?? this.begin(this.config.format);
    playback.bytesWritten += pcm.length;
    playback.process.stdin.write(pcm);
  }

  /**
   * Ends the current stream and waits for the player to drain it
   */
  async finish(): Promise<PlaybackResult> {
    const playback = this.active;
    if (!playback) {
      return { bytesWritten: 0, interrupted: false };
    }

    playback.process.stdin.end();
    await playback.exited;
    return { bytesWritten: playback.bytesWritten, interrupted: playback.interrupted };
  }

  /**
   * Kills playback at once, dropping anything still queued
   */
  stopImmediately(): boolean {
    const playback = this.active;
    if (!playback) {
      return false;
    }

    playback.interrupted = true;
    playback.process.stdin.destroy();
    playback.process.kill('SIGKILL');
    this.logger.info('Audio playback stopped', { bytesWritten: playback.bytesWritten });
    return true;
  }

  /**
   * Plays a whole WAV buffer to completion
   */
  async playWav(wav: Buffer): Promise<PlaybackResult> {
    const { format, pcm } = decodeWav(wav);
    if (this.active) {
      this.stopImmediately();
      await this.active?.exited;
    }

    const playback = this.begin(format);
    playback.bytesWritten = pcm.length;
    playback.process.stdin.end(pcm);
    await playback.exited;
    return { bytesWritten: playback.bytesWritten, interrupted: playback.interrupted };
  }

  private begin(format: PcmFormat): ActivePlayback {
    const args = alsaRawArgs(format, this.config.device);
    let child: AudioProcess;
    try {
      child = this.spawnProcess(this.config.command, args);
    } catch (error) {
      throw new AudioDeviceError('AUDIO_SPAWN_FAILED', `Failed to start ${this.config.command}`, describeError(error));
    }

    let settle: () => void = () => undefined;
    const exited = new Promise<void>(resolve => {
      settle = resolve;
    });

    const playback: ActivePlayback = { process: child, bytesWritten: 0, interrupted: false, exited };
    this.active = playback;

    // A killed player closes its stdin pipe; writes racing the kill fail with EPIPE
    child.stdin.on('error', error => {
      this.logger.debug('Player stdin closed', describeError(error));
    });

    child.stderr.on('data', (chunk: Buffer) => {
      this.logger.debug('aplay stderr', { output: chunk.toString('utf8').trim() });
    });

    let done = false;
    const complete = (code: number | null, failure?: Error): void => {
      if (done) return;
      done = true;
      if (this.active === playback) {
        this.active = undefined;
      }
      if (failure && !playback.interrupted) {
        this.logger.error('Playback process failed', describeError(failure));
        this.emit('error', new AudioDeviceError('AUDIO_SPAWN_FAILED', `${this.config.command} failed: ${failure.message}`));
      } else if (code !== 0 && code !== null && !playback.interrupted) {
        this.logger.warn('Playback process exited with error', { code });
      }
      this.logger.debug('Playback finished', { bytesWritten: playback.bytesWritten, interrupted: playback.interrupted });
      this.emit('playbackFinished', { bytesWritten: playback.bytesWritten, interrupted: playback.interrupted });
      settle();
    };

    child.on('exit', code => complete(code));
    child.on('error', error => complete(null, error));

    this.logger.debug('Playback started', { device: this.config.device, sampleRate: format.sampleRate });
    this.emit('playbackStarted');
    return playback;
  }
}
