import { hostConcurrencyFor } from '../config';
import { incSubnetsScanned } from '../metrics';
import type { SubnetScanResult } from '../types';
import type { ScanContext } from './context';
import { scanHostRange } from './hostScheduler';

/**
 * Scan one subnet, report its live hosts and tally, and publish the tally to
 * the run's statistics before returning. An unresponsive subnet is a normal
 * zero-responder result.
 */
export async function scanSubnet(
  subnetPrefix: string,
  startHost: number,
  endHost: number,
  ctx: ScanContext,
): Promise<SubnetScanResult> {
  const concurrency = hostConcurrencyFor(ctx.config, ctx.cores);

  const partial = await scanHostRange(subnetPrefix, startHost, endHost, concurrency, {
    probe: ctx.probe,
    timeoutSeconds: ctx.config.probeTimeoutSeconds,
    hardCap: ctx.config.hostConcurrencyCap,
    progressEvery: ctx.config.progressEvery,
    policy: ctx.config.policy,
    signal: ctx.signal,
    reporter: ctx.reporter,
  });

  const result: SubnetScanResult = { ...partial, liveAddresses: [...partial.liveAddresses] };

  for (const address of result.liveAddresses) ctx.reporter.hostAlive(address);
  ctx.reporter.subnetComplete(result);

  ctx.statistics.publish(result);
  incSubnetsScanned();

  return result;
}

export default scanSubnet;
