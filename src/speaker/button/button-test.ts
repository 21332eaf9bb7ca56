/**
 * Button Test
 *
 * Prints a line for every press until the signal aborts or the input quits.
 */

import { createSubsystemLogger, describeError } from '../../logging/subsystem.js';
import type { ButtonInput } from './button-input.js';

const log = createSubsystemLogger('speaker/button-test');

export interface ButtonTestOptions {
  signal: AbortSignal;
  print?: (line: string) => void;
}

/**
 * Resolves with the number of presses seen
 */
export function runButtonTest(button: ButtonInput, options: ButtonTestOptions): Promise<number> {
  const print = options.print ?? ((line: string) => process.stdout.write(`${line}\n`));
  let presses = 0;

  return new Promise<number>((resolve, reject) => {
    const onPressed = (): void => {
      presses++;
      print('Button pressed');
    };
    const onError = (error: Error): void => {
      cleanup();
      reject(error);
    };
    const finish = (): void => {
      cleanup();
      resolve(presses);
    };
    const cleanup = (): void => {
      button.off('pressed', onPressed);
      button.off('error', onError);
      button.off('quit', finish);
      options.signal.removeEventListener('abort', finish);
      button.stop();
      log.info('Button test finished', { presses });
    };

    if (options.signal.aborted) {
      resolve(0);
      return;
    }

    button.on('pressed', onPressed);
    button.on('error', onError);
    button.on('quit', finish);
    options.signal.addEventListener('abort', finish, { once: true });

    try {
      button.start();
    } catch (error) {
      log.error('Failed to start button', describeError(error));
      cleanup();
      reject(error);
      return;
    }
    print(`Watching the ${button.kind} button. Press Ctrl+C to exit.`);
  });
}
