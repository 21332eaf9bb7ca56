/**
 * Keyboard Button
 *
 * Fallback push-to-talk for machines without the GPIO button: each Enter is
 * a click (pressed, then released). Typing q quits.
 */

import { EventEmitter } from 'node:events';
import { createInterface, type Interface } from 'node:readline';
import type { Readable } from 'node:stream';
import { createSubsystemLogger } from '../../logging/subsystem.js';
import type { ButtonInput } from './button-input.js';

export class KeyboardButton extends EventEmitter implements ButtonInput {
  readonly kind = 'keyboard' as const;
  private readonly logger = createSubsystemLogger('speaker/button');
  private lines?: Interface;

  constructor(private readonly input: Readable = process.stdin) {
    super();
  }

  isActive(): boolean {
    return this.lines !== undefined;
  }

  start(): void {
    if (this.lines) {
      this.logger.warn('Keyboard input already started');
      return;
    }

    this.lines = createInterface({ input: this.input, terminal: false });
    this.lines.on('line', line => this.handleLine(line));
    this.logger.info('Keyboard input ready: press Enter to talk, q to quit');
  }

  stop(): void {
    if (!this.lines) return;
    const lines = this.lines;
    this.lines = undefined;
    lines.close();
  }

  private handleLine(line: string): void {
    const command = line.trim().toLowerCase();
    if (command === '') {
      this.emit('pressed');
      this.emit('released');
    } else if (command === 'q' || command === 'quit') {
      this.emit('quit');
    } else {
      this.logger.debug('Ignoring keyboard input', { line });
    }
  }
}
