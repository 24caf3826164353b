import { ConsoleReporter, formatProgress, formatSubnetTally, formatSummary } from '../lib/report';
import type { ScanSummary } from '../lib/types';
import { CollectingStream } from './helpers/stubProbe';

const summary: ScanSummary = {
  mode: 'quick',
  description: 'likely home and office networks',
  subnetsScanned: 8,
  hostsScanned: 2032,
  responders: 5,
  elapsedSeconds: 12.5,
  coresUtilized: 8,
  rate: 162.56,
  parallelEfficiency: 20.32,
  results: [],
  cancelled: false,
};

describe('report formatting', () => {
  test('summary block lists every statistic in order', () => {
    expect(formatSummary(summary)).toEqual([
      'Scan summary: likely home and office networks',
      'Subnets scanned: 8',
      'Hosts scanned: 2032',
      'Responders found: 5',
      'Elapsed: 12.50s',
      'Cores utilized: 8',
      'Rate: 162.6 hosts/s',
      'Parallel efficiency: 20.32x',
    ]);
  });

  test('undefined rate and cancellation are spelled out', () => {
    const lines = formatSummary({ ...summary, elapsedSeconds: 0, rate: undefined, parallelEfficiency: undefined, cancelled: true });
    expect(lines.slice(4)).toEqual([
      'Elapsed: 0.00s',
      'Cores utilized: 8',
      'Rate: n/a',
      'Parallel efficiency: n/a',
      'Scan cancelled before completion',
    ]);
  });

  test('progress and tally lines', () => {
    expect(formatProgress({ subnet: '192.168.1', completed: 50, total: 254, responders: 3 })).toBe(
      '[192.168.1] progress 50/254 hosts, 3 alive',
    );
    const tally = {
      subnet: '10.0.0',
      hostsScanned: 0,
      responders: 0,
      liveAddresses: [],
      probeErrors: 0,
      cancelled: false,
    };
    expect(formatSubnetTally(tally)).toBe('[10.0.0] 0 responder(s) out of 0 host(s)');
    expect(formatSubnetTally({ ...tally, error: 'EAGAIN' })).toBe('[10.0.0] 0 responder(s) out of 0 host(s) (failed: EAGAIN)');
  });
});

describe('ConsoleReporter', () => {
  test('writes one line per event', () => {
    const out = new CollectingStream();
    const reporter = new ConsoleReporter(out);

    reporter.hostAlive('10.0.0.5');
    reporter.subnetComplete({
      subnet: '10.0.0',
      hostsScanned: 10,
      responders: 1,
      liveAddresses: ['10.0.0.5'],
      probeErrors: 0,
      cancelled: false,
    });

    expect(out.chunks).toEqual(['Host alive: 10.0.0.5\n', '[10.0.0] 1 responder(s) out of 10 host(s)\n']);
  });

  test('summary is preceded by a blank line', () => {
    const out = new CollectingStream();
    new ConsoleReporter(out).summary(summary);
    expect(out.chunks[0]).toBe('\n');
    expect(out.chunks[1]).toBe('Scan summary: likely home and office networks\n');
    expect(out.chunks).toHaveLength(9);
  });
});
