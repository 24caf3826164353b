import type { ScanStatistics } from '../aggregator';
import type { ScanConfig } from '../config';
import type { ScanReporter } from '../report';
import type { ProbeCollaborator } from '../types';

/**
 * Everything a subnet scan needs, passed down explicitly so independent runs
 * never share counters by accident.
 */
export interface ScanContext {
  probe: ProbeCollaborator;
  statistics: ScanStatistics;
  config: ScanConfig;
  reporter: ScanReporter;
  signal?: AbortSignal;
  /** Logical core count used for the default per-subnet concurrency. */
  cores?: number;
}
