export { ScanStatistics } from './aggregator';
export { CONFIG, resolveScanConfig, hostConcurrencyFor } from './config';
export type { ScanConfig } from './config';
export { UsageError } from './errors';
export { planBatches, runInBatches } from './net/batchRunner';
export type { BatchItemResult, BatchOutcome, BatchRunOptions } from './net/batchRunner';
export { createProbe, createPingProbe, createTcpProbe } from './probes';
export { ConsoleReporter, silentReporter, formatSummary } from './report';
export type { ScanReporter, ProgressEvent } from './report';
export { generateClassCRange, normalizeSubnetPrefix, assertHostRange } from './subnet';
export { scanHostRange } from './sweep/hostScheduler';
export { scanSubnet } from './sweep/subnetScanner';
export { scanSubnets } from './sweep/subnetScheduler';
export { ScanOrchestrator, planScan, computeThroughput } from './sweep/orchestrator';
export type { ScanContext } from './sweep/context';
export * from './types';
