/**
 * ICMP reachability checks through the system `ping` binary
 */

import { spawn } from 'child_process';
import { promises as dns } from 'dns';
import { ProbeFailureReason, ProbeOutcome, Prober } from '../types';
import { ProbeError, errorMessage } from '../error-handling';
import { logger } from '../utils/logger';

interface DataSource {
  on(event: 'data', listener: (chunk: Buffer) => void): unknown;
}

/** The slice of a ChildProcess the prober relies on. */
export interface PingProcess {
  stdout: DataSource | null;
  stderr: DataSource | null;
  on(event: 'close', listener: (code: number | null) => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
  kill(signal?: NodeJS.Signals): boolean;
}

export type SpawnFn = (command: string, args: string[]) => PingProcess;
export type LookupFn = (hostname: string) => Promise<{ address: string; family: number }>;

export interface IcmpProberOptions {
  platform?: NodeJS.Platform;
  spawn?: SpawnFn;
  lookup?: LookupFn;
}

export interface PingCommand {
  command: string;
  args: string[];
}

const RTT_PATTERN = /time[=<]\s*([\d.]+)\s*ms/i;

export class IcmpProber implements Prober {
  private readonly platform: NodeJS.Platform;
  private readonly spawnProcess: SpawnFn;
  private readonly lookup: LookupFn;
  private log = logger.child('Prober');

  constructor(options: IcmpProberOptions = {}) {
    this.platform = options.platform ?? process.platform;
    this.spawnProcess = options.spawn ?? ((command, args) => spawn(command, args));
    this.lookup = options.lookup ?? (hostname => dns.lookup(hostname));
  }

  /**
   * Resolve a host name to an IP address. Rejects with ProbeError.
   */
  async resolve(address: string): Promise<string> {
    try {
      const result = await this.lookup(address);
      return result.address;
    } catch (error) {
      throw new ProbeError(`Failed to resolve ${address}: ${errorMessage(error)}`, address);
    }
  }

  /**
   * Send one echo request. Never rejects; every problem is a failure outcome.
   * One deadline covers the lookup and the echo, and the process is killed when
   * it passes, so the returned promise settles within `timeoutMs`.
   */
  probe(address: string, timeoutMs: number): Promise<ProbeOutcome> {
    return new Promise<ProbeOutcome>(resolve => {
      let settled = false;
      let pingProcess: PingProcess | null = null;

      const settle = (outcome: ProbeOutcome): void => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        resolve(outcome);
      };

      const timer = setTimeout(() => {
        pingProcess?.kill('SIGKILL');
        settle(failure('timeout', `No reply from ${address} within ${timeoutMs}ms`));
      }, timeoutMs);

      void this.lookup(address).then(
        resolved => {
          if (settled) {
            this.log.debug(`Lookup of ${address} finished after the deadline, not pinging`);
            return;
          }
          pingProcess = this.startPing(address, resolved, timeoutMs, settle);
        },
        (error: unknown) => {
          settle(failure('unresolvable', `Failed to resolve ${address}: ${errorMessage(error)}`));
        }
      );
    });
  }

  private startPing(
    address: string,
    resolved: { address: string; family: number },
    timeoutMs: number,
    settle: (outcome: ProbeOutcome) => void
  ): PingProcess | null {
    const { command, args } = buildPingCommand(this.platform, resolved.address, resolved.family, timeoutMs);
    this.log.debug(`Pinging ${address} (${resolved.address}) with timeout ${timeoutMs}ms`);

    let pingProcess: PingProcess;
    try {
      pingProcess = this.spawnProcess(command, args);
    } catch (error) {
      settle(failure('error', `Failed to spawn ping process: ${errorMessage(error)}`));
      return null;
    }

    let stdout = '';
    let stderr = '';
    pingProcess.stdout?.on('data', chunk => {
      stdout += chunk.toString();
    });
    pingProcess.stderr?.on('data', chunk => {
      stderr += chunk.toString();
    });

    pingProcess.on('error', error => {
      settle(failure('error', `Ping process error: ${error.message}`));
    });

    pingProcess.on('close', code => {
      if (code === 0) {
        settle({ kind: 'success', rtt_ms: parseRtt(stdout) });
      } else {
        const detail = stderr.trim();
        settle(failure('unreachable', detail || `${address} did not answer (exit code ${String(code)})`));
      }
    });

    return pingProcess;
  }
}

/**
 * Platform specific arguments for a single echo with a deadline
 */
export function buildPingCommand(
  platform: NodeJS.Platform,
  address: string,
  family: number,
  timeoutMs: number
): PingCommand {
  const ipv6 = family === 6;

  if (platform === 'win32') {
    return {
      command: 'ping',
      args: [...(ipv6 ? ['-6'] : []), '-n', '1', '-w', String(timeoutMs), address]
    };
  }

  if (platform === 'darwin') {
    // -W is milliseconds on BSD ping
    return {
      command: ipv6 ? 'ping6' : 'ping',
      args: ['-c', '1', '-W', String(timeoutMs), address]
    };
  }

  const seconds = Math.max(1, Math.ceil(timeoutMs / 1000));
  return {
    command: 'ping',
    args: [...(ipv6 ? ['-6'] : []), '-c', '1', '-W', String(seconds), address]
  };
}

export function parseRtt(output: string): number | null {
  const match = output.match(RTT_PATTERN);
  if (!match || match[1] === undefined) {
    return null;
  }
  const value = parseFloat(match[1]);
  return Number.isFinite(value) ? value : null;
}

function failure(reason: ProbeFailureReason, message: string): ProbeOutcome {
  return { kind: 'failure', reason, message };
}
