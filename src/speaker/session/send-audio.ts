/**
 * One-shot exchange: streams a recorded WAV to the realtime API and plays the
 * spoken reply.
 */

import { createSubsystemLogger } from '../../logging/subsystem.js';
import type { AudioPlayer } from '../audio/audio-player.js';
import { REALTIME_PCM_FORMAT } from '../audio/audio-process.js';
import { decodeWav, pcmDurationMs } from '../audio/wav.js';
import { AudioDeviceError, RealtimeConnectionError } from '../errors.js';
import type { RealtimeClient } from '../realtime/realtime-client.js';
import type { ResponseSummary, TranscriptEvent } from '../types/index.js';

const log = createSubsystemLogger('speaker/send-audio');

export interface SendAudioOptions {
  /** Bytes per input_audio_buffer.append (default: 100 ms of audio) */
  chunkBytes?: number;
  responseTimeoutMs?: number;
}

export interface SendAudioResult {
  bytesSent: number;
  chunks: number;
  durationMs: number;
  response: ResponseSummary;
  replyBytes: number;
  transcript?: string;
}

export async function sendAudio(
  client: RealtimeClient,
  player: AudioPlayer,
  wav: Buffer,
  options: SendAudioOptions = {},
): Promise<SendAudioResult> {
  const { format, pcm } = decodeWav(wav);
  const expected = REALTIME_PCM_FORMAT;
  if (
    format.sampleRate !== expected.sampleRate ||
    format.channels !== expected.channels ||
    format.bitsPerSample !== expected.bitsPerSample
  ) {
    throw new AudioDeviceError(
      'AUDIO_INVALID_WAV',
      `Expected ${expected.sampleRate} Hz mono 16-bit PCM, got ${format.sampleRate} Hz, ${format.channels} channel(s), ${format.bitsPerSample}-bit`,
      { ...format },
    );
  }
  if (pcm.length === 0) {
    throw new AudioDeviceError('AUDIO_INVALID_WAV', 'WAV file contains no audio');
  }

  const chunkBytes = options.chunkBytes ?? 4800;
  const responseTimeoutMs = options.responseTimeoutMs ?? 60000;
  let replyBytes = 0;
  let transcript: string | undefined;

  const onAudio = (chunk: Buffer): void => {
    replyBytes += chunk.length;
    player.write(chunk);
  };
  const onTranscript = (event: TranscriptEvent): void => {
    if (event.role === 'assistant' && event.final) {
      transcript = event.text;
    }
  };

  client.on('audioDelta', onAudio);
  client.on('transcript', onTranscript);

  try {
    let chunks = 0;
    client.clearAudio();
    for (let offset = 0; offset < pcm.length; offset += chunkBytes) {
      client.appendAudio(pcm.subarray(offset, offset + chunkBytes));
      chunks++;
    }
    client.commitAudio();
    client.createResponse();

    // Server events arrive asynchronously, after the sends above
    const response = new Promise<ResponseSummary>((resolve, reject) => {
      const timer = setTimeout(() => {
        finish();
        reject(new RealtimeConnectionError('REALTIME_SERVER_ERROR', `No response after ${responseTimeoutMs}ms`));
      }, responseTimeoutMs);

      const onDone = (summary: ResponseSummary): void => {
        finish();
        resolve(summary);
      };
      const onServerError = (error: RealtimeConnectionError): void => {
        finish();
        reject(error);
      };
      const onClose = (): void => {
        finish();
        reject(new RealtimeConnectionError('REALTIME_NOT_CONNECTED', 'Connection closed before the response finished'));
      };
      const finish = (): void => {
        clearTimeout(timer);
        client.off('responseDone', onDone);
        client.off('serverError', onServerError);
        client.off('close', onClose);
      };

      client.on('responseDone', onDone);
      client.on('serverError', onServerError);
      client.on('close', onClose);
    });

    const durationMs = pcmDurationMs(pcm.length, format);
    log.info('Audio sent, waiting for the reply', { bytes: pcm.length, chunks, durationMs });

    const summary = await response;
    await player.finish();

    log.info('Reply played', { status: summary.status, replyBytes });
    return { bytesSent: pcm.length, chunks, durationMs, response: summary, replyBytes, transcript };
  } finally {
    client.off('audioDelta', onAudio);
    client.off('transcript', onTranscript);
  }
}
