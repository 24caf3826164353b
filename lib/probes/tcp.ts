import net from 'net';
import { CONFIG } from '../config';
import logger from '../logger';
import { withTimeout } from '../net/timeout';
import type { ProbeCollaborator, ProbeResult } from '../types';

type ConnectOutcome = 'connected' | 'refused';

function connectOnce(socket: net.Socket, address: string, port: number): Promise<ConnectOutcome> {
  return new Promise<ConnectOutcome>((resolve, reject) => {
    socket.once('connect', () => resolve('connected'));
    socket.once('error', (err: NodeJS.ErrnoException) => {
      // a RST means something at that address answered
      if (err.code === 'ECONNREFUSED') resolve('refused');
      else reject(err);
    });
    socket.connect(port, address);
  });
}

export interface TcpProbeOptions {
  ports?: number[];
}

/**
 * Reachability without spawning processes or raw sockets: a host is alive if
 * any configured port completes a handshake or actively refuses it.
 * All ports are tried at once under a single `timeoutSeconds` deadline.
 */
export function createTcpProbe(opts: TcpProbeOptions = {}): ProbeCollaborator {
  const ports = opts.ports ?? CONFIG.PROBE.TCP_PORTS;

  return {
    name: 'tcp',
    async probe(address: string, timeoutSeconds: number): Promise<ProbeResult> {
      if (!ports.length) return { alive: false };
      const sockets = ports.map(() => new net.Socket());
      const attempts = ports.map((port, i) =>
        connectOnce(sockets[i], address, port).then((outcome) => ({ port, outcome })),
      );
      try {
        const first = await withTimeout(Promise.any(attempts), timeoutSeconds * 1000);
        logger.debug({ address, port: first.port, outcome: first.outcome }, 'tcp probe answered');
        return { alive: true };
      } catch (err) {
        logger.debug({ address, ports, err }, 'tcp probe got no answer');
        return { alive: false };
      } finally {
        for (const s of sockets) s.destroy();
      }
    },
  };
}

export default createTcpProbe;
