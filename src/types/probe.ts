/**
 * Probe outcome types
 */

export type ProbeFailureReason = 'timeout' | 'unreachable' | 'unresolvable' | 'error';

export type ProbeOutcome =
  | { kind: 'success'; rtt_ms: number | null }
  | { kind: 'failure'; reason: ProbeFailureReason; message: string };

export interface Prober {
  probe(address: string, timeoutMs: number): Promise<ProbeOutcome>;
  resolve(address: string): Promise<string>;
}
