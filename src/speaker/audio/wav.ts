/**
 * WAV (RIFF/WAVE PCM) encoding and decoding
 */

import { AudioDeviceError } from '../errors.js';
import type { PcmFormat } from './audio-process.js';

const HEADER_SIZE = 44;
const PCM_FORMAT_TAG = 1;

export interface DecodedWav {
  format: PcmFormat;
  pcm: Buffer;
}

export function encodeWav(pcm: Buffer, format: PcmFormat): Buffer {
  const blockAlign = format.channels * (format.bitsPerSample / 8);
  const header = Buffer.alloc(HEADER_SIZE);

  header.write('RIFF', 0, 'ascii');
  header.writeUInt32LE(36 + pcm.length, 4);
  header.write('WAVE', 8, 'ascii');
  header.write('fmt ', 12, 'ascii');
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(PCM_FORMAT_TAG, 20);
  header.writeUInt16LE(format.channels, 22);
  header.writeUInt32LE(format.sampleRate, 24);
  header.writeUInt32LE(format.sampleRate * blockAlign, 28);
  header.writeUInt16LE(blockAlign, 32);
  header.writeUInt16LE(format.bitsPerSample, 34);
  header.write('data', 36, 'ascii');
  header.writeUInt32LE(pcm.length, 40);

  return Buffer.concat([header, pcm]);
}

export function decodeWav(buffer: Buffer): DecodedWav {
  if (buffer.length < 12 || buffer.toString('ascii', 0, 4) !== 'RIFF' || buffer.toString('ascii', 8, 12) !== 'WAVE') {
    throw new AudioDeviceError('AUDIO_INVALID_WAV', 'Not a RIFF/WAVE file');
  }

  let format: PcmFormat | undefined;
  let offset = 12;

  // Chunks are word-aligned; odd sizes carry one pad byte
  while (offset + 8 <= buffer.length) {
    const id = buffer.toString('ascii', offset, offset + 4);
    const size = buffer.readUInt32LE(offset + 4);
    const body = offset + 8;

    if (id === 'fmt ') {
      if (size < 16 || body + 16 > buffer.length) {
        throw new AudioDeviceError('AUDIO_INVALID_WAV', 'WAV fmt chunk is truncated');
      }
      const formatTag = buffer.readUInt16LE(body);
      if (formatTag !== PCM_FORMAT_TAG) {
        throw new AudioDeviceError('AUDIO_INVALID_WAV', `Unsupported WAV encoding (format ${formatTag}); only PCM is supported`);
      }
      format = {
        channels: buffer.readUInt16LE(body + 2),
        sampleRate: buffer.readUInt32LE(body + 4),
        bitsPerSample: buffer.readUInt16LE(body + 14),
      };
    } else if (id === 'data') {
      if (!format) {
        throw new AudioDeviceError('AUDIO_INVALID_WAV', 'WAV data chunk appears before fmt chunk');
      }
      const end = Math.min(body + size, buffer.length);
      return { format, pcm: buffer.subarray(body, end) };
    }

    offset = body + size + (size % 2);
  }

  throw new AudioDeviceError('AUDIO_INVALID_WAV', 'WAV file has no data chunk');
}

export function pcmDurationMs(byteLength: number, format: PcmFormat): number {
  const bytesPerSecond = format.sampleRate * format.channels * (format.bitsPerSample / 8);
  return Math.round((byteLength / bytesPerSecond) * 1000);
}
