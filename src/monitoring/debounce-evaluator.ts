/**
 * Debounced state machine turning raw probe outcomes into confirmed
 * status transitions for one tenant
 */

import { ProbeOutcome, SampleStatus, Tenant, Transition } from '../types';

/** The parts of a tenant the evaluator reads and writes. */
export type DebounceState = Pick<
  Tenant,
  | 'id'
  | 'current_status'
  | 'consecutive_count'
  | 'accumulating_status'
  | 'required_consecutive'
  | 'last_status_change'
>;

export class DebounceEvaluator {
  /**
   * Apply one outcome to a tenant draft in place.
   * Returns the confirmed transition, or null when the status holds.
   */
  observe(state: DebounceState, outcome: ProbeOutcome, at: Date = new Date()): Transition | null {
    const raw = toSampleStatus(outcome);
    const required = Math.max(1, state.required_consecutive);

    if (raw === state.accumulating_status) {
      state.consecutive_count = Math.min(state.consecutive_count + 1, required);
    } else {
      state.accumulating_status = raw;
      state.consecutive_count = 1;
    }

    if (state.consecutive_count === required && raw !== state.current_status) {
      const from = state.current_status;
      state.current_status = raw;
      state.consecutive_count = 0;
      state.last_status_change = at;
      return { tenant_id: state.id, from, to: raw, at };
    }

    return null;
  }
}

export function toSampleStatus(outcome: ProbeOutcome): SampleStatus {
  return outcome.kind === 'success' ? 'up' : 'down';
}

/**
 * Keep the counter inside [0, required] after the threshold changes
 */
export function clampCounter(state: DebounceState): void {
  state.consecutive_count = Math.max(0, Math.min(state.consecutive_count, state.required_consecutive));
}
