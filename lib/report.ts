import type { ScanSummary, SubnetScanResult } from './types';

export interface ProgressEvent {
  subnet: string;
  completed: number;
  total: number;
  responders: number;
}

/**
 * Receives human-readable scan output. Calls are synchronous and must not block probing.
 */
export interface ScanReporter {
  progress(event: ProgressEvent): void;
  hostAlive(address: string): void;
  subnetComplete(result: SubnetScanResult): void;
  summary(summary: ScanSummary): void;
}

export function formatProgress(e: ProgressEvent): string {
  return `[${e.subnet}] progress ${e.completed}/${e.total} hosts, ${e.responders} alive`;
}

export function formatSubnetTally(r: SubnetScanResult): string {
  const tally = `[${r.subnet}] ${r.responders} responder(s) out of ${r.hostsScanned} host(s)`;
  return r.error ? `${tally} (failed: ${r.error})` : tally;
}

export function formatSummary(s: ScanSummary): string[] {
  const lines = [
    `Scan summary: ${s.description}`,
    `Subnets scanned: ${s.subnetsScanned}`,
    `Hosts scanned: ${s.hostsScanned}`,
    `Responders found: ${s.responders}`,
    `Elapsed: ${s.elapsedSeconds.toFixed(2)}s`,
    `Cores utilized: ${s.coresUtilized}`,
    `Rate: ${s.rate === undefined ? 'n/a' : `${s.rate.toFixed(1)} hosts/s`}`,
    `Parallel efficiency: ${s.parallelEfficiency === undefined ? 'n/a' : `${s.parallelEfficiency.toFixed(2)}x`}`,
  ];
  if (s.cancelled) lines.push('Scan cancelled before completion');
  return lines;
}

export interface Writable {
  write(chunk: string): unknown;
}

export class ConsoleReporter implements ScanReporter {
  constructor(private readonly out: Writable = process.stdout) {}

  private line(text: string) {
    this.out.write(`${text}\n`);
  }

  progress(event: ProgressEvent): void {
    this.line(formatProgress(event));
  }

  hostAlive(address: string): void {
    this.line(`Host alive: ${address}`);
  }

  subnetComplete(result: SubnetScanResult): void {
    this.line(formatSubnetTally(result));
  }

  summary(summary: ScanSummary): void {
    this.line('');
    for (const l of formatSummary(summary)) this.line(l);
  }
}

export const silentReporter: ScanReporter = {
  progress: () => undefined,
  hostAlive: () => undefined,
  subnetComplete: () => undefined,
  summary: () => undefined,
};
