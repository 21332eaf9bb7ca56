/**
 * AudioPlayer Unit Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { AudioPlayer, type PlaybackResult } from './audio-player.js';
import { encodeWav } from './wav.js';
import { createFakeProcessFactory, flush, type FakeAudioProcess } from '../test-setup.js';

vi.mock('../../logging/subsystem.js', () => ({
  createSubsystemLogger: vi.fn(() => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    debug: vi.fn(),
  })),
  describeError: vi.fn((error: unknown) => ({ error: String(error) })),
}));

describe('AudioPlayer', () => {
  let processes: FakeAudioProcess[];
  let player: AudioPlayer;
  let finished: PlaybackResult[];

  beforeEach(() => {
    const fake = createFakeProcessFactory();
    processes = fake.processes;
    player = new AudioPlayer({ device: 'plughw:0' }, fake.factory);
    finished = [];
    player.on('playbackFinished', (result: PlaybackResult) => finished.push(result));
  });

  it('starts aplay lazily on the first write', () => {
    const started = vi.fn();
    player.on('playbackStarted', started);

    player.write(Buffer.alloc(0));
    expect(processes).toHaveLength(0);

    player.write(Buffer.from([1, 2]));
    player.write(Buffer.from([3, 4]));

    expect(processes).toHaveLength(1);
    expect(processes[0].command).toBe('aplay');
    expect(processes[0].args).toEqual(['-q', '-t', 'raw', '-f', 'S16_LE', '-r', '24000', '-c', '1', '-D', 'plughw:0']);
    expect(started).toHaveBeenCalledTimes(1);
    expect(player.isPlaying()).toBe(true);
  });

  it('drains queued audio on finish', async () => {
    player.write(Buffer.from([1, 2, 3, 4]));
    player.write(Buffer.from([5, 6]));

    const result = await player.finish();

    expect(result).toEqual({ bytesWritten: 6, interrupted: false });
    expect([...processes[0].writtenBytes]).toEqual([1, 2, 3, 4, 5, 6]);
    expect(finished).toEqual([{ bytesWritten: 6, interrupted: false }]);
    expect(player.isPlaying()).toBe(false);
  });

  it('finishes at once when nothing is playing', async () => {
    await expect(player.finish()).resolves.toEqual({ bytesWritten: 0, interrupted: false });
  });

  it('kills playback immediately', async () => {
    player.write(Buffer.from([1, 2]));

    expect(player.stopImmediately()).toBe(true);
    await flush();

    expect(processes[0].killedWith).toBe('SIGKILL');
    expect(finished).toEqual([{ bytesWritten: 2, interrupted: true }]);
    expect(player.isPlaying()).toBe(false);
    expect(player.stopImmediately()).toBe(false);
  });

  it('plays a WAV with its own format', async () => {
    const pcm = Buffer.from([10, 20, 30, 40]);

    const result = await player.playWav(encodeWav(pcm, { sampleRate: 16000, channels: 1, bitsPerSample: 16 }));

    expect(result).toEqual({ bytesWritten: 4, interrupted: false });
    expect(processes[0].args).toContain('16000');
    expect([...processes[0].writtenBytes]).toEqual([10, 20, 30, 40]);
  });
});
