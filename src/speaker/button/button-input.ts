/**
 * Button Input
 *
 * Push-to-talk sources emit 'pressed' and 'released'; the keyboard fallback
 * also emits 'quit'. Failures surface as 'error'.
 */

import type { EventEmitter } from 'node:events';
import type { InputKind } from '../types/index.js';

export interface ButtonInput extends EventEmitter {
  readonly kind: InputKind;
  start(): void;
  stop(): void;
  isActive(): boolean;
}

export type ButtonEdge = 'falling' | 'rising';

export interface EdgeEvent {
  edge: ButtonEdge;
  /** Kernel timestamp of the edge in milliseconds */
  timestampMs: number;
}

export type ButtonTransition = 'pressed' | 'released';

/**
 * Debounces edges from an active-low button: falling is a press, rising a
 * release. Edges that repeat the current state or arrive within bounceMs of
 * the last accepted edge are dropped.
 */
export class ButtonDebouncer {
  private pressed = false;
  private lastAcceptedMs?: number;

  constructor(private readonly bounceMs: number) {}

  accept(event: EdgeEvent): ButtonTransition | null {
    const pressing = event.edge === 'falling';
    if (pressing === this.pressed) {
      return null;
    }
    if (this.lastAcceptedMs !== undefined && event.timestampMs - this.lastAcceptedMs < this.bounceMs) {
      return null;
    }

    this.pressed = pressing;
    this.lastAcceptedMs = event.timestampMs;
    return pressing ? 'pressed' : 'released';
  }

  isPressed(): boolean {
    return this.pressed;
  }

  reset(): void {
    this.pressed = false;
    this.lastAcceptedMs = undefined;
  }
}
