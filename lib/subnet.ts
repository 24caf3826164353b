import networks from '../data/networks.json';
import { UsageError } from './errors';
import type { HostRange } from './types';

export const MIN_HOST = 1;
export const MAX_HOST = 254;
export const FULL_HOST_RANGE: HostRange = { startHost: MIN_HOST, endHost: MAX_HOST };

const OCTET = /^(25[0-5]|2[0-4]\d|1\d\d|[1-9]?\d)$/;

/**
 * Normalize user input to a three-octet prefix. Accepts "192.168.50",
 * "192.168.50." and the network forms "192.168.50.0" / "192.168.50.0/24".
 * Throws UsageError when the input is not a /24 prefix.
 */
export function normalizeSubnetPrefix(input: string): string {
  let octets = input.trim().replace(/\/24$/, '').replace(/\.$/, '').split('.');
  if (octets.length === 4 && octets[3] === '0') octets = octets.slice(0, 3);
  if (octets.length !== 3 || !octets.every((o) => OCTET.test(o))) {
    throw new UsageError(`invalid subnet prefix "${input}", expected three octets such as 192.168.1`);
  }
  return octets.join('.');
}

export function isValidSubnetPrefix(input: string): boolean {
  try {
    normalizeSubnetPrefix(input);
    return true;
  } catch {
    return false;
  }
}

export function assertHostRange(startHost: number, endHost: number): HostRange {
  if (!Number.isInteger(startHost) || !Number.isInteger(endHost)) {
    throw new UsageError(`host bounds must be integers, got ${startHost}..${endHost}`);
  }
  if (startHost < MIN_HOST || endHost > MAX_HOST || startHost > endHost) {
    throw new UsageError(`host bounds must satisfy ${MIN_HOST} <= start <= end <= ${MAX_HOST}, got ${startHost}..${endHost}`);
  }
  return { startHost, endHost };
}

export function hostAddress(subnetPrefix: string, hostNumber: number): string {
  return `${subnetPrefix}.${hostNumber}`;
}

export function hostNumbers({ startHost, endHost }: HostRange): number[] {
  return Array.from({ length: endHost - startHost + 1 }, (_, i) => startHost + i);
}

/**
 * Every 192.168.x prefix, x = 0..255.
 */
export function generateClassCRange(): string[] {
  return Array.from({ length: 256 }, (_, x) => `192.168.${x}`);
}

export function commonNetworks(): string[] {
  return networks.common.map(normalizeSubnetPrefix);
}

export function quickNetworks(): string[] {
  return networks.quick.map(normalizeSubnetPrefix);
}
