// Centralized runtime configuration for probe timeouts, concurrency ceilings and reporting cadence.
// Values are read from env with sane defaults and can be overridden per scan.

import { availableParallelism } from 'os';
import type { BatchPolicy, ProbeKind } from './types';

function envInt(name: string, fallback: number): number {
  const v = process.env[name];
  if (!v) return fallback;
  const n = Number(v);
  return Number.isInteger(n) && n > 0 ? n : fallback;
}

function envIntList(name: string, fallback: number[]): number[] {
  const v = process.env[name];
  if (!v) return fallback;
  const parsed = v
    .split(',')
    .map((s) => Number(s.trim()))
    .filter((n) => Number.isInteger(n) && n > 0 && n <= 65535);
  return parsed.length ? parsed : fallback;
}

function envProbeKind(): ProbeKind {
  return process.env.PROBE_KIND === 'tcp' ? 'tcp' : 'ping';
}

function envBatchPolicy(): BatchPolicy {
  return process.env.BATCH_POLICY === 'window' ? 'window' : 'barrier';
}

export const CONFIG = {
  LOG_LEVEL: process.env.LOG_LEVEL || 'info',

  PROBE: {
    KIND: envProbeKind(),
    TIMEOUT_SECONDS: envInt('PROBE_TIMEOUT_SECONDS', 1),
    PING_BINARY: process.env.PING_BINARY || 'ping',
    TCP_PORTS: envIntList('PROBE_TCP_PORTS', [80, 443, 22]),
  },

  CONCURRENCY: {
    HOST_HARD_CAP: envInt('HOST_CONCURRENCY_CAP', 128),
    SUBNET_HARD_CAP: envInt('SUBNET_CONCURRENCY_CAP', 16),
    HOSTS_PER_CORE: envInt('HOSTS_PER_CORE', 4),
    POLICY: envBatchPolicy(),
  },

  PROGRESS_EVERY: envInt('PROGRESS_EVERY', 50),
};

/**
 * Immutable settings handed to the sweep engine for one run.
 */
export interface ScanConfig {
  readonly probeTimeoutSeconds: number;
  /** Hard ceiling on concurrent probes inside one subnet scan. */
  readonly hostConcurrencyCap: number;
  /** Hard ceiling on concurrently running subnet scans. */
  readonly subnetConcurrencyCap: number;
  /** Explicit per-subnet host concurrency; derived from core count when absent. */
  readonly hostConcurrency?: number;
  readonly hostsPerCore: number;
  readonly progressEvery: number;
  readonly policy: BatchPolicy;
}

export function resolveScanConfig(overrides: Partial<ScanConfig> = {}): ScanConfig {
  return {
    probeTimeoutSeconds: overrides.probeTimeoutSeconds ?? CONFIG.PROBE.TIMEOUT_SECONDS,
    hostConcurrencyCap: overrides.hostConcurrencyCap ?? CONFIG.CONCURRENCY.HOST_HARD_CAP,
    subnetConcurrencyCap: overrides.subnetConcurrencyCap ?? CONFIG.CONCURRENCY.SUBNET_HARD_CAP,
    hostConcurrency: overrides.hostConcurrency,
    hostsPerCore: overrides.hostsPerCore ?? CONFIG.CONCURRENCY.HOSTS_PER_CORE,
    progressEvery: overrides.progressEvery ?? CONFIG.PROGRESS_EVERY,
    policy: overrides.policy ?? CONFIG.CONCURRENCY.POLICY,
  };
}

export function logicalCoreCount(): number {
  return Math.max(1, availableParallelism());
}

/**
 * Per-subnet probe concurrency: explicit value if configured, otherwise
 * `hostsPerCore` probes per logical core. Always clamped to [1, hostConcurrencyCap].
 */
export function hostConcurrencyFor(config: ScanConfig, cores = logicalCoreCount()): number {
  const wanted = config.hostConcurrency ?? config.hostsPerCore * cores;
  return Math.max(1, Math.min(wanted, config.hostConcurrencyCap));
}

export default CONFIG;
