/**
 * KeyboardButton and Button Test Unit Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { PassThrough } from 'node:stream';
import { KeyboardButton } from './keyboard-button.js';
import { GpioButton } from './gpio-button.js';
import { runButtonTest } from './button-test.js';
import { createFakeProcessFactory, flush } from '../test-setup.js';

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

describe('KeyboardButton', () => {
  let input: PassThrough;
  let button: KeyboardButton;
  let events: string[];

  beforeEach(() => {
    input = new PassThrough();
    button = new KeyboardButton(input);
    events = [];
    for (const name of ['pressed', 'released', 'quit']) {
      button.on(name, () => events.push(name));
    }
  });

  it('turns Enter into a click', async () => {
    button.start();
    input.write('\n');
    await flush();

    expect(events).toEqual(['pressed', 'released']);
  });

  it('emits quit for q and ignores other text', async () => {
    button.start();
    input.write('hello\n');
    input.write('Q\n');
    await flush();

    expect(events).toEqual(['quit']);
  });

  it('stops reading on stop', async () => {
    button.start();
    expect(button.isActive()).toBe(true);

    button.stop();
    input.write('\n');
    await flush();

    expect(button.isActive()).toBe(false);
    expect(events).toEqual([]);
  });
});

describe('runButtonTest', () => {
  it('prints each press until aborted', async () => {
    const input = new PassThrough();
    const printed: string[] = [];
    const controller = new AbortController();

    const done = runButtonTest(new KeyboardButton(input), {
      signal: controller.signal,
      print: line => printed.push(line),
    });
    input.write('\n\n');
    await flush();
    controller.abort();

    await expect(done).resolves.toBe(2);
    expect(printed).toEqual(['Watching the keyboard button. Press Ctrl+C to exit.', 'Button pressed', 'Button pressed']);
  });

  it('finishes when the input quits', async () => {
    const input = new PassThrough();
    const done = runButtonTest(new KeyboardButton(input), {
      signal: new AbortController().signal,
      print: () => undefined,
    });

    input.write('q\n');

    await expect(done).resolves.toBe(0);
  });

  it('rejects when the button fails', async () => {
    const fake = createFakeProcessFactory();
    const done = runButtonTest(new GpioButton({}, fake.factory), {
      signal: new AbortController().signal,
      print: () => undefined,
    });

    fake.processes[0].exit(1);

    await expect(done).rejects.toMatchObject({ code: 'AUDIO_PROCESS_EXITED' });
  });
});
