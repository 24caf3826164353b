import net from 'net';
import { createPingProbe, pingArgs, runCommand } from '../lib/probes/ping';
import type { CommandOutcome, RunCommand } from '../lib/probes/ping';
import { createTcpProbe } from '../lib/probes/tcp';

describe('pingArgs', () => {
  test('linux sends one echo with a reply timeout in seconds', () => {
    expect(pingArgs('192.168.50.1', 1, 'linux')).toEqual(['-c', '1', '-W', '1', '192.168.50.1']);
  });

  test('macOS uses -t for the timeout', () => {
    expect(pingArgs('10.0.0.1', 2, 'darwin')).toEqual(['-c', '1', '-t', '2', '10.0.0.1']);
  });

  test('windows takes a count and a timeout in milliseconds', () => {
    expect(pingArgs('10.0.0.1', 2, 'win32')).toEqual(['-n', '1', '-w', '2000', '10.0.0.1']);
  });
});

describe('createPingProbe', () => {
  function fakeRun(outcome: CommandOutcome) {
    return jest.fn<ReturnType<RunCommand>, Parameters<RunCommand>>().mockResolvedValue(outcome);
  }

  test('exit status 0 means alive', async () => {
    const run = fakeRun({ exitCode: 0, killed: false });
    const probe = createPingProbe({ binary: 'ping', platform: 'linux', run });

    await expect(probe.probe('10.0.0.1', 1)).resolves.toEqual({ alive: true });
    expect(run).toHaveBeenCalledWith('ping', ['-c', '1', '-W', '1', '10.0.0.1'], 2000);
  });

  test('non-zero exit or a killed process means dead without error', async () => {
    const noReply = createPingProbe({ platform: 'linux', run: fakeRun({ exitCode: 1, killed: false }) });
    await expect(noReply.probe('10.0.0.2', 1)).resolves.toEqual({ alive: false });

    const killed = createPingProbe({ platform: 'linux', run: fakeRun({ exitCode: null, killed: true }) });
    await expect(killed.probe('10.0.0.2', 1)).resolves.toEqual({ alive: false });
  });

  test('a spawn failure is dead with the error attached', async () => {
    const run = fakeRun({ exitCode: null, killed: false, spawnError: 'ENOENT: spawn ping ENOENT' });
    const probe = createPingProbe({ platform: 'linux', run });
    await expect(probe.probe('10.0.0.3', 1)).resolves.toEqual({ alive: false, error: 'ENOENT: spawn ping ENOENT' });
  });
});

describe('createTcpProbe', () => {
  let server: net.Server;
  let openPort: number;

  beforeAll(async () => {
    server = net.createServer((socket) => socket.destroy());
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', () => resolve()));
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('expected a TCP address');
    openPort = address.port;
  });

  afterAll(async () => {
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  async function closedPort(): Promise<number> {
    const s = net.createServer();
    await new Promise<void>((resolve) => s.listen(0, '127.0.0.1', () => resolve()));
    const address = s.address();
    if (address === null || typeof address === 'string') throw new Error('expected a TCP address');
    await new Promise<void>((resolve) => s.close(() => resolve()));
    return address.port;
  }

  test('a completed handshake means alive', async () => {
    const probe = createTcpProbe({ ports: [openPort] });
    await expect(probe.probe('127.0.0.1', 1)).resolves.toEqual({ alive: true });
  });

  test('a refused connection still proves the host is up', async () => {
    const probe = createTcpProbe({ ports: [await closedPort()] });
    await expect(probe.probe('127.0.0.1', 1)).resolves.toEqual({ alive: true });
  });

  test('no ports to try means dead', async () => {
    const probe = createTcpProbe({ ports: [] });
    await expect(probe.probe('127.0.0.1', 1)).resolves.toEqual({ alive: false });
  });
});

describe('runCommand', () => {
  test('exit status 0 is reported as 0', async () => {
    await expect(runCommand(process.execPath, ['-e', 'process.exit(0)'], 5000)).resolves.toEqual({
      exitCode: 0,
      killed: false,
    });
  });

  test('a non-zero exit status is passed through', async () => {
    await expect(runCommand(process.execPath, ['-e', 'process.exit(1)'], 5000)).resolves.toEqual({
      exitCode: 1,
      killed: false,
    });
  });

  test('a process outliving the watchdog is killed', async () => {
    await expect(runCommand(process.execPath, ['-e', 'setTimeout(() => {}, 5000)'], 100)).resolves.toEqual({
      exitCode: null,
      killed: true,
    });
  });

  test('a missing binary is a spawn error', async () => {
    const outcome = await runCommand('/nonexistent/netsweep-ping', ['-c', '1', '10.0.0.1'], 1000);
    expect(outcome.exitCode).toBeNull();
    expect(outcome.killed).toBe(false);
    expect(outcome.spawnError).toMatch(/^ENOENT/);
  });
});
