import { ScanStatistics } from '../aggregator';
import { logicalCoreCount, resolveScanConfig } from '../config';
import type { ScanConfig } from '../config';
import { UsageError } from '../errors';
import logger from '../logger';
import { silentReporter } from '../report';
import type { ScanReporter } from '../report';
import {
  FULL_HOST_RANGE,
  assertHostRange,
  commonNetworks,
  generateClassCRange,
  normalizeSubnetPrefix,
  quickNetworks,
} from '../subnet';
import type { HostRange, ProbeCollaborator, ScanMode, ScanRequest, ScanSummary } from '../types';
import { scanSubnets } from './subnetScheduler';

export interface ScanPlan {
  mode: ScanMode;
  description: string;
  subnets: string[];
  range: HostRange;
}

/**
 * Resolve a request into the subnets to sweep. All user input is validated
 * here, so a rejected request never reaches a probe.
 */
export function planScan(request: ScanRequest): ScanPlan {
  switch (request.mode) {
    case 'common':
      return { mode: 'common', description: 'common private networks', subnets: commonNetworks(), range: FULL_HOST_RANGE };
    case 'full':
      return { mode: 'full', description: 'full 192.168.0.0/16 range', subnets: generateClassCRange(), range: FULL_HOST_RANGE };
    case 'quick':
      return { mode: 'quick', description: 'likely home and office networks', subnets: quickNetworks(), range: FULL_HOST_RANGE };
    case 'single': {
      const subnet = normalizeSubnetPrefix(request.subnet);
      const range = assertHostRange(request.startHost, request.endHost);
      return {
        mode: 'single',
        description: `${subnet}.${range.startHost}-${range.endHost}`,
        subnets: [subnet],
        range,
      };
    }
    default: {
      const unknown: never = request;
      throw new UsageError(`unknown scan mode: ${JSON.stringify(unknown)}`);
    }
  }
}

/**
 * Hosts per second and that rate per core. Both are undefined when no
 * measurable time elapsed.
 */
export function computeThroughput(
  hosts: number,
  elapsedSeconds: number,
  cores: number,
): { rate: number | undefined; parallelEfficiency: number | undefined } {
  if (!(elapsedSeconds > 0)) return { rate: undefined, parallelEfficiency: undefined };
  const rate = hosts / elapsedSeconds;
  return { rate, parallelEfficiency: cores > 0 ? rate / cores : undefined };
}

export interface OrchestratorOptions {
  probe: ProbeCollaborator;
  config?: ScanConfig;
  reporter?: ScanReporter;
  statistics?: ScanStatistics;
  /** Millisecond clock. */
  now?: () => number;
  cores?: number;
}

export class ScanOrchestrator {
  private readonly probe: ProbeCollaborator;
  private readonly config: ScanConfig;
  private readonly reporter: ScanReporter;
  private readonly now: () => number;
  private readonly cores: number;
  private running = false;
  readonly statistics: ScanStatistics;

  constructor(opts: OrchestratorOptions) {
    this.probe = opts.probe;
    this.config = opts.config ?? resolveScanConfig();
    this.reporter = opts.reporter ?? silentReporter;
    this.statistics = opts.statistics ?? new ScanStatistics();
    this.now = opts.now ?? (() => performance.now());
    this.cores = opts.cores ?? logicalCoreCount();
  }

  async run(request: ScanRequest, opts?: { signal?: AbortSignal }): Promise<ScanSummary> {
    const plan = planScan(request);
    if (this.running) {
      throw new Error('a scan is already running on this orchestrator');
    }
    this.running = true;
    try {
      this.statistics.reset();
      logger.info({ mode: plan.mode, subnets: plan.subnets.length, probe: this.probe.name }, 'scan started');

      const started = this.now();
      const results = await scanSubnets(
        plan.subnets,
        plan.description,
        plan.mode === 'single' ? 1 : this.config.subnetConcurrencyCap,
        {
          probe: this.probe,
          statistics: this.statistics,
          config: this.config,
          reporter: this.reporter,
          signal: opts?.signal,
          cores: this.cores,
        },
        plan.range,
      );
      const elapsedSeconds = Math.max(0, (this.now() - started) / 1000);

      const totals = this.statistics.snapshot();
      const cancelled = results.length < plan.subnets.length || results.some((r) => r.cancelled);
      const summary: ScanSummary = {
        mode: plan.mode,
        description: plan.description,
        subnetsScanned: totals.subnets,
        hostsScanned: totals.hosts,
        responders: totals.responders,
        elapsedSeconds,
        coresUtilized: this.cores,
        ...computeThroughput(totals.hosts, elapsedSeconds, this.cores),
        results,
        cancelled,
      };

      logger.info(
        { mode: plan.mode, hosts: totals.hosts, responders: totals.responders, elapsedSeconds, cancelled },
        'scan finished',
      );
      this.reporter.summary(summary);
      return summary;
    } finally {
      this.running = false;
    }
  }
}

export default ScanOrchestrator;
