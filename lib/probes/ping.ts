import { execFile } from 'child_process';
import { CONFIG } from '../config';
import logger from '../logger';
import type { ProbeCollaborator, ProbeResult } from '../types';

export interface CommandOutcome {
  exitCode: number | null; // null when the process never ran or was killed
  killed: boolean;
  spawnError?: string;
}

export type RunCommand = (file: string, args: string[], timeoutMs: number) => Promise<CommandOutcome>;

/**
 * Default runner on top of `child_process.execFile`. Never rejects: a non-zero
 * exit is a normal outcome for ping (no reply), not an error.
 */
export const runCommand: RunCommand = (file, args, timeoutMs) =>
  new Promise((resolve) => {
    execFile(file, args, { timeout: timeoutMs, windowsHide: true }, (error) => {
      if (!error) {
        resolve({ exitCode: 0, killed: false });
        return;
      }
      if (typeof error.code === 'number') {
        resolve({ exitCode: error.code, killed: false });
        return;
      }
      if (error.killed) {
        resolve({ exitCode: null, killed: true });
        return;
      }
      resolve({ exitCode: null, killed: false, spawnError: error.code ? `${error.code}: ${error.message}` : error.message });
    });
  });

/**
 * One echo request with a reply timeout, in the flag dialect of the platform's ping.
 */
export function pingArgs(address: string, timeoutSeconds: number, platform: NodeJS.Platform = process.platform): string[] {
  switch (platform) {
    case 'win32':
      return ['-n', '1', '-w', String(timeoutSeconds * 1000), address];
    case 'darwin':
    case 'freebsd':
      return ['-c', '1', '-t', String(timeoutSeconds), address];
    default:
      return ['-c', '1', '-W', String(timeoutSeconds), address];
  }
}

export interface PingProbeOptions {
  binary?: string;
  platform?: NodeJS.Platform;
  run?: RunCommand;
}

export function createPingProbe(opts: PingProbeOptions = {}): ProbeCollaborator {
  const binary = opts.binary ?? CONFIG.PROBE.PING_BINARY;
  const platform = opts.platform ?? process.platform;
  const run = opts.run ?? runCommand;

  return {
    name: 'ping',
    async probe(address: string, timeoutSeconds: number): Promise<ProbeResult> {
      // watchdog one second past ping's own reply timeout
      const outcome = await run(binary, pingArgs(address, timeoutSeconds, platform), (timeoutSeconds + 1) * 1000);
      if (outcome.spawnError) {
        logger.debug({ address, binary, error: outcome.spawnError }, 'ping could not be started');
        return { alive: false, error: outcome.spawnError };
      }
      return { alive: outcome.exitCode === 0 };
    },
  };
}

export default createPingProbe;
