import { CONFIG } from '../config';
import { UsageError } from '../errors';
import logger from '../logger';
import { observeProbe } from '../metrics';
import { runInBatches } from '../net/batchRunner';
import type { ProgressEvent, ScanReporter } from '../report';
import { assertHostRange, hostAddress, hostNumbers } from '../subnet';
import type { BatchPolicy, HostProbeTask, ProbeCollaborator, SubnetScanResult } from '../types';

export interface HostRangeOptions {
  probe: ProbeCollaborator;
  timeoutSeconds: number;
  /** Upper bound applied to `maxConcurrency`. */
  hardCap?: number;
  /** Emit a progress line each time this many hosts have completed. */
  progressEvery?: number;
  policy?: BatchPolicy;
  signal?: AbortSignal;
  reporter?: ScanReporter;
}

export type HostRangeResult = Omit<SubnetScanResult, 'error'>;

interface ProbedHost {
  task: HostProbeTask;
  error?: string;
}

export function clampConcurrency(requested: number, hardCap: number): number {
  if (!Number.isInteger(requested) || requested < 1) {
    throw new UsageError(`concurrency must be an integer >= 1, got ${requested}`);
  }
  return Math.min(requested, hardCap);
}

/**
 * Probe `subnetPrefix.startHost` .. `subnetPrefix.endHost` with at most
 * `maxConcurrency` probes outstanding. Under the default barrier policy each
 * batch is fully joined before the next is issued.
 *
 * A probe that fails or cannot be launched counts as dead; the range always
 * runs to completion unless `signal` aborts between batches.
 */
export async function scanHostRange(
  subnetPrefix: string,
  startHost: number,
  endHost: number,
  maxConcurrency: number,
  opts: HostRangeOptions,
): Promise<HostRangeResult> {
  const range = assertHostRange(startHost, endHost);
  const concurrency = clampConcurrency(maxConcurrency, opts.hardCap ?? CONFIG.CONCURRENCY.HOST_HARD_CAP);
  const progressEvery = opts.progressEvery ?? CONFIG.PROGRESS_EVERY;
  const hosts = hostNumbers(range);

  let completed = 0;
  let aliveSoFar = 0;

  // output only: a failing reporter must not turn a probed host into a failed one
  const reportProgress = (event: ProgressEvent) => {
    try {
      opts.reporter?.progress(event);
    } catch (err) {
      logger.warn({ subnet: subnetPrefix, err }, 'progress reporter failed');
    }
  };

  const probeHost = async (hostNumber: number): Promise<ProbedHost> => {
    const task: HostProbeTask = { address: hostAddress(subnetPrefix, hostNumber), alive: 'unknown', completed: false };
    const started = performance.now();
    let failed = true;
    try {
      const res = await opts.probe.probe(task.address, opts.timeoutSeconds);
      task.alive = res.alive ? 'alive' : 'dead';
      failed = res.error !== undefined;
      if (res.error) logger.debug({ address: task.address, error: res.error }, 'probe reported an error, host treated as dead');
      return { task, error: res.error };
    } finally {
      task.completed = true;
      completed++;
      if (task.alive === 'alive') aliveSoFar++;
      observeProbe((performance.now() - started) / 1000, task.alive === 'alive', failed);
      if (completed % progressEvery === 0) {
        reportProgress({ subnet: subnetPrefix, completed, total: hosts.length, responders: aliveSoFar });
      }
    }
  };

  const outcome = await runInBatches(hosts, probeHost, {
    batchSize: concurrency,
    policy: opts.policy,
    signal: opts.signal,
    onBatchStart: (index, batch) =>
      logger.debug({ subnet: subnetPrefix, batch: index, first: batch[0], size: batch.length }, 'host batch started'),
  });

  const liveAddresses: string[] = [];
  let probeErrors = 0;
  for (const r of outcome.results) {
    if (!r.ok) {
      probeErrors++;
      logger.warn({ address: hostAddress(subnetPrefix, r.item), err: r.error }, 'probe could not be launched, host treated as dead');
      continue;
    }
    if (r.value.error !== undefined) probeErrors++;
    if (r.value.task.alive === 'alive') liveAddresses.push(r.value.task.address);
  }

  return {
    subnet: subnetPrefix,
    hostsScanned: outcome.results.length,
    responders: liveAddresses.length,
    liveAddresses,
    probeErrors,
    cancelled: outcome.cancelled,
  };
}

export default scanHostRange;
