/**
 * Tests for the debounce state machine
 */

import { DebounceEvaluator, DebounceState, clampCounter } from './debounce-evaluator';
import { FAILURE, SUCCESS } from '../testing/fakes';
import { ProbeOutcome, Transition } from '../types';

function freshState(required: number): DebounceState {
  return {
    id: 'guild-1',
    current_status: 'unknown',
    consecutive_count: 0,
    accumulating_status: null,
    required_consecutive: required,
    last_status_change: null
  };
}

function feed(evaluator: DebounceEvaluator, state: DebounceState, outcomes: ProbeOutcome[]): Transition[] {
  const transitions: Transition[] = [];
  outcomes.forEach((outcome, index) => {
    const transition = evaluator.observe(state, outcome, new Date(1_700_000_000_000 + index * 1000));
    if (transition) {
      transitions.push(transition);
    }
  });
  return transitions;
}

describe('DebounceEvaluator', () => {
  let evaluator: DebounceEvaluator;

  beforeEach(() => {
    evaluator = new DebounceEvaluator();
  });

  it('should confirm down on the third failure with threshold 3', () => {
    const state = freshState(3);

    expect(evaluator.observe(state, FAILURE)).toBeNull();
    expect(evaluator.observe(state, FAILURE)).toBeNull();
    const at = new Date('2024-05-01T10:00:00Z');
    const transition = evaluator.observe(state, FAILURE, at);

    expect(transition).toEqual({ tenant_id: 'guild-1', from: 'unknown', to: 'down', at });
    expect(state.current_status).toBe('down');
    expect(state.consecutive_count).toBe(0);
    expect(state.last_status_change).toBe(at);
  });

  it('should transition on every alternating sample with threshold 1', () => {
    const state = freshState(1);

    const transitions = feed(evaluator, state, [SUCCESS, FAILURE, SUCCESS, FAILURE]);

    expect(transitions.map(t => `${t.from}->${t.to}`)).toEqual([
      'unknown->up',
      'up->down',
      'down->up',
      'up->down'
    ]);
    expect(state.current_status).toBe('down');
  });

  it('should ignore flapping shorter than the threshold', () => {
    const state = freshState(3);

    const transitions = feed(evaluator, state, [
      FAILURE, FAILURE, SUCCESS, FAILURE, FAILURE, SUCCESS, FAILURE, FAILURE
    ]);

    expect(transitions).toEqual([]);
    expect(state.current_status).toBe('unknown');
    expect(state.accumulating_status).toBe('down');
    expect(state.consecutive_count).toBe(2);
  });

  it('should not repeat a transition while the status holds', () => {
    const state = freshState(2);

    const transitions = feed(evaluator, state, [FAILURE, FAILURE, FAILURE, FAILURE, FAILURE, FAILURE]);

    expect(transitions).toHaveLength(1);
    expect(state.consecutive_count).toBe(2);
  });

  it('should saturate the counter at the threshold', () => {
    const state = freshState(3);
    feed(evaluator, state, [FAILURE, FAILURE, FAILURE]);

    const counts: number[] = [];
    for (let i = 0; i < 5; i++) {
      evaluator.observe(state, FAILURE);
      counts.push(state.consecutive_count);
    }

    expect(counts).toEqual([1, 2, 3, 3, 3]);
  });

  it('should restart counting when the raw status changes', () => {
    const state = freshState(3);

    feed(evaluator, state, [SUCCESS, SUCCESS, FAILURE]);

    expect(state.accumulating_status).toBe('down');
    expect(state.consecutive_count).toBe(1);
    expect(state.current_status).toBe('unknown');
  });

  it('should treat every failure reason as a down sample', () => {
    const state = freshState(1);
    const timeout: ProbeOutcome = { kind: 'failure', reason: 'timeout', message: 'no reply' };

    expect(evaluator.observe(state, timeout)?.to).toBe('down');
  });

  it('should keep the counter within bounds for arbitrary sequences', () => {
    // deterministic linear congruential sequence
    let seed = 42;
    const next = (): number => {
      seed = (seed * 1103515245 + 12345) % 2147483648;
      return seed;
    };

    for (const required of [1, 2, 3, 5, 8]) {
      const state = freshState(required);
      for (let i = 0; i < 500; i++) {
        const outcome = next() % 3 === 0 ? SUCCESS : FAILURE;
        evaluator.observe(state, outcome);
        expect(state.consecutive_count).toBeGreaterThanOrEqual(0);
        expect(state.consecutive_count).toBeLessThanOrEqual(required);
      }
    }
  });

  it('should never return to unknown', () => {
    const state = freshState(1);
    const statuses = new Set<string>();

    feed(evaluator, state, [SUCCESS, FAILURE, FAILURE, SUCCESS]).forEach(t => statuses.add(t.to));

    expect(statuses.has('unknown')).toBe(false);
    expect(state.current_status).toBe('up');
  });

  describe('clampCounter', () => {
    it('should clamp the counter after the threshold is lowered', () => {
      const state = freshState(5);
      feed(evaluator, state, [FAILURE, FAILURE, FAILURE, FAILURE]);
      expect(state.consecutive_count).toBe(4);

      state.required_consecutive = 2;
      clampCounter(state);

      expect(state.consecutive_count).toBe(2);
    });

    it('should confirm on the next matching sample after clamping', () => {
      const state = freshState(5);
      feed(evaluator, state, [FAILURE, FAILURE, FAILURE]);
      state.required_consecutive = 2;
      clampCounter(state);

      expect(evaluator.observe(state, FAILURE)?.to).toBe('down');
    });
  });
});
