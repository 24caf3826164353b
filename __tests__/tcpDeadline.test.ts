jest.mock('net', () => {
  const { EventEmitter } = jest.requireActual<typeof import('events')>('events');
  // connects on 443 only; every other port stays silent forever
  class SilentSocket extends EventEmitter {
    static created: SilentSocket[] = [];
    destroyed = false;
    constructor() {
      super();
      SilentSocket.created.push(this);
    }
    connect(port: number) {
      if (port === 443) setImmediate(() => this.emit('connect'));
      return this;
    }
    destroy() {
      this.destroyed = true;
      return this;
    }
  }
  return { __esModule: true, default: { Socket: SilentSocket } };
});

import { createTcpProbe } from '../lib/probes/tcp';

type SocketTracker = { default: { Socket: { created: Array<{ destroyed: boolean }> } } };
const created = () => jest.requireMock<SocketTracker>('net').default.Socket.created;

describe('createTcpProbe deadline', () => {
  beforeEach(() => {
    created().length = 0;
  });

  test('a silent host is dead after one timeout, not one per port', async () => {
    const probe = createTcpProbe({ ports: [80, 8080, 22] });

    const started = Date.now();
    const result = await probe.probe('10.9.9.9', 1);
    const elapsed = Date.now() - started;

    expect(result).toEqual({ alive: false });
    expect(elapsed).toBeGreaterThanOrEqual(900);
    expect(elapsed).toBeLessThan(1500);
    expect(created()).toHaveLength(3);
    expect(created().every((s) => s.destroyed)).toBe(true);
  });

  test('one answering port is enough and the others are released', async () => {
    const probe = createTcpProbe({ ports: [80, 443, 22] });

    const started = Date.now();
    const result = await probe.probe('10.9.9.9', 1);

    expect(result).toEqual({ alive: true });
    expect(Date.now() - started).toBeLessThan(500);
    expect(created().every((s) => s.destroyed)).toBe(true);
  });
});
