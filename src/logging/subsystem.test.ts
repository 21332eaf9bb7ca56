import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  createSubsystemLogger,
  describeError,
  formatLogLine,
  getLogLevel,
  setJsonLogging,
  setLogLevel,
  setLogSink,
  type LogLevel,
} from './subsystem.js';

describe('subsystem logger', () => {
  let lines: Array<{ level: LogLevel; line: string }>;
  let previousLevel: LogLevel;

  beforeEach(() => {
    lines = [];
    previousLevel = getLogLevel();
    setLogSink((level, line) => lines.push({ level, line }));
    setJsonLogging(false);
    setLogLevel('info');
  });

  afterEach(() => {
    setLogSink();
    setLogLevel(previousLevel);
  });

  it('formats text lines with level, subsystem and data', () => {
    const line = formatLogLine('warn', 'speaker/audio', 'Device busy', { device: 'hw:1' }, new Date('2024-05-01T10:00:00.000Z'), false);
    expect(line).toBe('[2024-05-01T10:00:00.000Z] [WARN ] [speaker/audio] Device busy {"device":"hw:1"}');
  });

  it('omits empty data in text mode', () => {
    const line = formatLogLine('info', 'main', 'Ready', {}, new Date('2024-05-01T10:00:00.000Z'), false);
    expect(line).toBe('[2024-05-01T10:00:00.000Z] [INFO ] [main] Ready');
  });

  it('formats JSON entries', () => {
    const line = formatLogLine('error', 'speaker/tools', 'Failed', { tool: 'get_weather' }, new Date('2024-05-01T10:00:00.000Z'), true);
    expect(JSON.parse(line)).toEqual({
      ts: '2024-05-01T10:00:00.000Z',
      level: 'error',
      subsystem: 'speaker/tools',
      msg: 'Failed',
      data: { tool: 'get_weather' },
    });
  });

  it('filters entries below the minimum level', () => {
    const log = createSubsystemLogger('test');
    log.debug('hidden');
    log.info('shown');
    log.error('also shown');

    expect(lines.map(l => l.level)).toEqual(['info', 'error']);
    expect(lines[0].line).toContain('[test] shown');
  });

  it('emits debug entries once the level is lowered', () => {
    setLogLevel('debug');
    createSubsystemLogger('test').debug('visible now');
    expect(lines).toHaveLength(1);
    expect(lines[0].level).toBe('debug');
  });

  it('describes errors with their code', () => {
    const error = Object.assign(new Error('boom'), { code: 'AUDIO_SPAWN_FAILED' });
    expect(describeError(error)).toEqual({ error: 'boom', name: 'Error', code: 'AUDIO_SPAWN_FAILED' });
    expect(describeError('plain')).toEqual({ error: 'plain' });
  });
});
