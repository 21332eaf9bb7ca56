/**
 * WAV Codec Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { decodeWav, encodeWav, pcmDurationMs } from './wav.js';
import { REALTIME_PCM_FORMAT } from './audio-process.js';
import { AudioDeviceError } from '../errors.js';

function chunk(id: string, body: Buffer): Buffer {
  const header = Buffer.alloc(8);
  header.write(id, 0, 'ascii');
  header.writeUInt32LE(body.length, 4);
  const pad = body.length % 2 === 1 ? Buffer.alloc(1) : Buffer.alloc(0);
  return Buffer.concat([header, body, pad]);
}

describe('encodeWav', () => {
  it('writes a 44-byte PCM header', () => {
    const wav = encodeWav(Buffer.from([1, 2, 3, 4]), REALTIME_PCM_FORMAT);

    expect(wav.length).toBe(48);
    expect(wav.toString('ascii', 0, 4)).toBe('RIFF');
    expect(wav.readUInt32LE(4)).toBe(40);
    expect(wav.toString('ascii', 8, 16)).toBe('WAVEfmt ');
    expect(wav.readUInt16LE(20)).toBe(1);
    expect(wav.readUInt16LE(22)).toBe(1);
    expect(wav.readUInt32LE(24)).toBe(24000);
    expect(wav.readUInt32LE(28)).toBe(48000);
    expect(wav.readUInt16LE(32)).toBe(2);
    expect(wav.readUInt16LE(34)).toBe(16);
    expect(wav.toString('ascii', 36, 40)).toBe('data');
    expect(wav.readUInt32LE(40)).toBe(4);
    expect([...wav.subarray(44)]).toEqual([1, 2, 3, 4]);
  });
});

describe('decodeWav', () => {
  it('reads format and data', () => {
    const decoded = decodeWav(encodeWav(Buffer.from([5, 6]), { sampleRate: 16000, channels: 1, bitsPerSample: 16 }));

    expect(decoded.format).toEqual({ sampleRate: 16000, channels: 1, bitsPerSample: 16 });
    expect([...decoded.pcm]).toEqual([5, 6]);
  });

  it('skips unknown chunks including padded odd sizes', () => {
    const encoded = encodeWav(Buffer.from([9, 8, 7, 6]), REALTIME_PCM_FORMAT);
    const fmt = encoded.subarray(12, 36);
    const data = encoded.subarray(36);
    const list = chunk('LIST', Buffer.from('abc'));
    const body = Buffer.concat([Buffer.from('WAVE', 'ascii'), fmt, list, data]);
    const riff = Buffer.alloc(8);
    riff.write('RIFF', 0, 'ascii');
    riff.writeUInt32LE(body.length, 4);

    const decoded = decodeWav(Buffer.concat([riff, body]));

    expect([...decoded.pcm]).toEqual([9, 8, 7, 6]);
  });

  it('rejects files that are not RIFF/WAVE', () => {
    expect(() => decodeWav(Buffer.from('hello world, not audio'))).toThrowError('Not a RIFF/WAVE file');
  });

  it('rejects non-PCM encodings', () => {
    const wav = encodeWav(Buffer.from([0, 0]), REALTIME_PCM_FORMAT);
    wav.writeUInt16LE(3, 20);

    expect(() => decodeWav(wav)).toThrowError('Unsupported WAV encoding (format 3); only PCM is supported');
  });

  it.each([
    ['cut off after the chunk header', encodeWav(Buffer.alloc(0), REALTIME_PCM_FORMAT).subarray(0, 24)],
    ['declared shorter than 16 bytes', Buffer.concat([Buffer.from('RIFF\x1c\x00\x00\x00WAVEfmt \x08\x00\x00\x00', 'latin1'), Buffer.alloc(8)])],
  ])('rejects a fmt chunk %s', (_label, wav) => {
    expect(() => decodeWav(wav)).toThrow(AudioDeviceError);
    expect(() => decodeWav(wav)).toThrowError('WAV fmt chunk is truncated');
  });

  it('rejects files without a data chunk', () => {
    const headerOnly = encodeWav(Buffer.alloc(0), REALTIME_PCM_FORMAT).subarray(0, 36);

    expect(() => decodeWav(headerOnly)).toThrow(AudioDeviceError);
    expect(() => decodeWav(headerOnly)).toThrowError('WAV file has no data chunk');
  });
});

describe('pcmDurationMs', () => {
  it('computes duration from byte length', () => {
    expect(pcmDurationMs(48000, REALTIME_PCM_FORMAT)).toBe(1000);
    expect(pcmDurationMs(4800, REALTIME_PCM_FORMAT)).toBe(100);
    expect(pcmDurationMs(0, REALTIME_PCM_FORMAT)).toBe(0);
  });
});
