import logger from '../logger';
import { runInBatches } from '../net/batchRunner';
import { FULL_HOST_RANGE } from '../subnet';
import type { HostRange, SubnetScanResult } from '../types';
import type { ScanContext } from './context';
import { clampConcurrency } from './hostScheduler';
import { scanSubnet } from './subnetScanner';

function failedSubnet(subnet: string, error: Error): SubnetScanResult {
  return {
    subnet,
    hostsScanned: 0,
    responders: 0,
    liveAddresses: [],
    probeErrors: 0,
    cancelled: false,
    error: error.message,
  };
}

/**
 * Scan subnets with at most `maxConcurrentSubnets` running at once (capped by
 * the configured subnet ceiling). Each subnet runs its own host batches, so
 * total outstanding probes stay within subnets x hosts-per-subnet.
 *
 * Results come back in input order. Subnets never started because of an
 * abort are left out; a subnet whose scan rejected is reported as zero hosts.
 */
export async function scanSubnets(
  subnetList: readonly string[],
  description: string,
  maxConcurrentSubnets: number,
  ctx: ScanContext,
  range: HostRange = FULL_HOST_RANGE,
): Promise<SubnetScanResult[]> {
  const concurrency = clampConcurrency(maxConcurrentSubnets, ctx.config.subnetConcurrencyCap);
  logger.info({ description, subnets: subnetList.length, concurrency, policy: ctx.config.policy }, 'subnet sweep started');

  const outcome = await runInBatches(
    subnetList,
    (subnet) => scanSubnet(subnet, range.startHost, range.endHost, ctx),
    {
      batchSize: concurrency,
      policy: ctx.config.policy,
      signal: ctx.signal,
      onBatchStart: (index, batch) => logger.debug({ description, batch: index, subnets: batch }, 'subnet batch started'),
    },
  );

  if (outcome.cancelled) {
    logger.warn({ description, completed: outcome.results.length, total: subnetList.length }, 'subnet sweep cancelled');
  }

  return outcome.results.map((r) => {
    if (r.ok) return r.value;
    logger.error({ subnet: r.item, err: r.error }, 'subnet scan failed, recorded as zero hosts');
    const failed = failedSubnet(r.item, r.error);
    ctx.reporter.subnetComplete(failed);
    return failed;
  });
}

export default scanSubnets;
