import { CONFIG } from '../config';
import type { ProbeCollaborator, ProbeKind } from '../types';
import createPingProbe from './ping';
import createTcpProbe from './tcp';

export function createProbe(kind: ProbeKind = CONFIG.PROBE.KIND): ProbeCollaborator {
  return kind === 'tcp' ? createTcpProbe() : createPingProbe();
}

export { createPingProbe, createTcpProbe };
export default { createProbe, createPingProbe, createTcpProbe };
