import type { StatisticsSnapshot, SubnetScanResult } from "./types";

/**
 * Process-wide scan counters shared by every concurrently running subnet scan.
 *
 * Each update is a single increment performed between `await` points, so
 * interleaved scanners cannot lose or duplicate an update. No invariant spans
 * more than one counter, hence no broader lock.
 *
 * `reset()` belongs to whoever owns the run and must not be called while a
 * scan is in flight.
 */
export class ScanStatistics {
  private hosts = 0;
  private responders = 0;
  private subnets = 0;

  addHosts(n: number): void {
    this.hosts += n;
  }

  addResponders(n: number): void {
    this.responders += n;
  }

  addSubnets(n: number): void {
    this.subnets += n;
  }

  /**
   * Publish a finished subnet tally in one step.
   */
  publish(result: SubnetScanResult): void {
    this.addHosts(result.hostsScanned);
    this.addResponders(result.responders);
    this.addSubnets(1);
  }

  reset(): void {
    this.hosts = 0;
    this.responders = 0;
    this.subnets = 0;
  }

  snapshot(): StatisticsSnapshot {
    return { hosts: this.hosts, responders: this.responders, subnets: this.subnets };
  }
}

export default ScanStatistics;
