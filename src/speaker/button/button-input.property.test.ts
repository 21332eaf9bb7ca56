/**
 * Button Debouncer Property Tests
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { ButtonDebouncer, type ButtonTransition, type EdgeEvent } from './button-input.js';
import { edgeGapsArbitrary, propertyTestConfig } from '../test-setup.js';

const edgeTimelineArbitrary = fc.array(
  fc.record({
    gap: fc.integer({ min: 0, max: 400 }),
    edge: fc.constantFrom<EdgeEvent['edge']>('falling', 'rising'),
  }),
  { minLength: 1, maxLength: 40 },
);

function toEvents(timeline: Array<{ gap: number; edge: EdgeEvent['edge'] }>): EdgeEvent[] {
  let now = 0;
  return timeline.map(({ gap, edge }) => {
    now += gap;
    return { edge, timestampMs: now };
  });
}

describe('ButtonDebouncer properties', () => {
  it('accepted transitions alternate and start with a press', () => {
    fc.assert(
      fc.property(edgeTimelineArbitrary, fc.integer({ min: 0, max: 200 }), (timeline, bounceMs) => {
        const debouncer = new ButtonDebouncer(bounceMs);
        const accepted: ButtonTransition[] = [];
        for (const event of toEvents(timeline)) {
          const transition = debouncer.accept(event);
          if (transition) accepted.push(transition);
        }

        accepted.forEach((transition, index) => {
          expect(transition).toBe(index % 2 === 0 ? 'pressed' : 'released');
        });
      }),
      propertyTestConfig,
    );
  });

  it('accepted edges are at least bounceMs apart', () => {
    fc.assert(
      fc.property(edgeTimelineArbitrary, fc.integer({ min: 0, max: 200 }), (timeline, bounceMs) => {
        const debouncer = new ButtonDebouncer(bounceMs);
        const acceptedAt: number[] = [];
        for (const event of toEvents(timeline)) {
          if (debouncer.accept(event)) acceptedAt.push(event.timestampMs);
        }

        for (let i = 1; i < acceptedAt.length; i++) {
          expect(acceptedAt[i] - acceptedAt[i - 1]).toBeGreaterThanOrEqual(bounceMs);
        }
      }),
      propertyTestConfig,
    );
  });

  it('accepts every alternating edge spaced beyond the bounce window', () => {
    fc.assert(
      fc.property(edgeGapsArbitrary, gaps => {
        const bounceMs = 100;
        const debouncer = new ButtonDebouncer(bounceMs);
        let now = 0;
        let accepted = 0;

        gaps.forEach((gap, index) => {
          now += bounceMs + gap;
          const edge = index % 2 === 0 ? 'falling' : 'rising';
          if (debouncer.accept({ edge, timestampMs: now })) accepted++;
        });

        expect(accepted).toBe(gaps.length);
        expect(debouncer.isPressed()).toBe(gaps.length % 2 === 1);
      }),
      propertyTestConfig,
    );
  });
});
