/**
 * Minimal Prometheus metrics using `prom-client`.
 *
 * Metrics:
 * - `netsweep_hosts_probed_total` (Counter)
 * - `netsweep_responders_total` (Counter)
 * - `netsweep_probe_errors_total` (Counter), probes that failed rather than got no answer
 * - `netsweep_subnets_scanned_total` (Counter)
 * - `netsweep_probe_duration_seconds` (Histogram)
 *
 * Usage:
 * import { register } from './lib/metrics'
 * process.stdout.write(await register.metrics())
 */

import { Counter, Histogram, register } from 'prom-client';

export const hostsProbedTotal = new Counter({
  name: 'netsweep_hosts_probed_total',
  help: 'Total number of host probes completed',
});

export const respondersTotal = new Counter({
  name: 'netsweep_responders_total',
  help: 'Total number of hosts that answered a probe',
});

export const probeErrorsTotal = new Counter({
  name: 'netsweep_probe_errors_total',
  help: 'Total number of probes that could not be executed',
});

export const subnetsScannedTotal = new Counter({
  name: 'netsweep_subnets_scanned_total',
  help: 'Total number of subnet scans completed',
});

export const probeDuration = new Histogram({
  name: 'netsweep_probe_duration_seconds',
  help: 'Histogram of single probe duration in seconds',
  buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.25, 0.5, 1, 2, 5],
});

export function observeProbe(seconds: number, alive: boolean, failed: boolean): void {
  hostsProbedTotal.inc();
  if (alive) respondersTotal.inc();
  if (failed) probeErrorsTotal.inc();
  if (isFinite(seconds) && seconds >= 0) probeDuration.observe(seconds);
}

export function incSubnetsScanned(count = 1): void {
  subnetsScannedTotal.inc(count);
}

export { register };
const metrics = { register, observeProbe, incSubnetsScanned };
export default metrics;
