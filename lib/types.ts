export type ProbeKind = 'ping' | 'tcp';

/** How a batch runner releases work: full join per batch, or a rolling window. */
export type BatchPolicy = 'barrier' | 'window';

export interface ProbeResult {
  alive: boolean;
  error?: string; // set when the probe itself failed rather than getting no answer
}

/**
 * Liveness check for one address. Implementations enforce their own timeout.
 */
export interface ProbeCollaborator {
  readonly name: string;
  probe(address: string, timeoutSeconds: number): Promise<ProbeResult>;
}

export type Liveness = 'unknown' | 'alive' | 'dead';

export interface HostProbeTask {
  address: string;
  alive: Liveness;
  completed: boolean;
}

export interface HostRange {
  startHost: number;
  endHost: number;
}

export interface SubnetScanResult {
  subnet: string; // e.g. "192.168.50"
  hostsScanned: number;
  responders: number;
  liveAddresses: string[]; // ascending host number
  probeErrors: number;
  cancelled: boolean;
  error?: string; // set when the subnet scan could not be launched at all
}

export interface StatisticsSnapshot {
  hosts: number;
  responders: number;
  subnets: number;
}

export type ScanMode = 'common' | 'full' | 'single' | 'quick';

export type ScanRequest =
  | { mode: 'common' }
  | { mode: 'full' }
  | { mode: 'quick' }
  | { mode: 'single'; subnet: string; startHost: number; endHost: number };

export interface ScanSummary {
  mode: ScanMode;
  description: string;
  subnetsScanned: number;
  hostsScanned: number;
  responders: number;
  elapsedSeconds: number;
  coresUtilized: number;
  rate: number | undefined; // hosts per second; undefined when no time elapsed
  parallelEfficiency: number | undefined;
  results: SubnetScanResult[];
  cancelled: boolean;
}
