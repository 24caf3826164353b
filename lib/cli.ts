#!/usr/bin/env node
import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import { CONFIG, resolveScanConfig } from './config';
import { UsageError, toError } from './errors';
import logger from './logger';
import { register } from './metrics';
import { createProbe } from './probes';
import { ConsoleReporter } from './report';
import type { Writable } from './report';
import { ScanOrchestrator } from './sweep/orchestrator';
import type { BatchPolicy, ProbeCollaborator, ProbeKind, ScanRequest } from './types';

type GlobalOptions = {
  probe: ProbeKind;
  timeout: number;
  hostConcurrency?: number;
  subnetConcurrency?: number;
  policy: BatchPolicy;
  metrics?: boolean;
};

export interface CliDeps {
  probeFactory?: (kind: ProbeKind) => ProbeCollaborator;
  out?: Writable;
  err?: Writable;
  /** Receives the controller so SIGINT (or a test) can abort the scan. */
  onController?: (controller: AbortController) => void;
}

const EXIT_INTERRUPTED = 130;

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError('expected a positive integer');
  return n;
}

function parseHostNumber(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n)) throw new InvalidArgumentError('expected an integer host number');
  return n;
}

/**
 * Build the command tree. Every subcommand resolves to exactly one scan;
 * its exit code is written to `state.exitCode`.
 */
export function createProgram(deps: CliDeps = {}, state: { exitCode: number } = { exitCode: 0 }): Command {
  const out = deps.out ?? process.stdout;
  const err = deps.err ?? process.stderr;
  const probeFactory = deps.probeFactory ?? createProbe;

  const program = new Command()
    .name('netsweep')
    .description('Discover live hosts on private IPv4 /24 networks')
    .addOption(new Option('--probe <kind>', 'liveness probe').choices(['ping', 'tcp']).default(CONFIG.PROBE.KIND))
    .option('--timeout <seconds>', 'per-probe timeout in seconds', parsePositiveInt, CONFIG.PROBE.TIMEOUT_SECONDS)
    .option('--host-concurrency <n>', 'concurrent probes per subnet', parsePositiveInt)
    .option('--subnet-concurrency <n>', 'concurrent subnet scans', parsePositiveInt)
    .addOption(
      new Option('--policy <policy>', 'batch release policy').choices(['barrier', 'window']).default(CONFIG.CONCURRENCY.POLICY),
    )
    .option('--metrics', 'print Prometheus metrics after the summary')
    .exitOverride()
    .configureOutput({
      writeOut: (s) => out.write(s),
      writeErr: (s) => err.write(s),
    });

  const runScan = async (request: ScanRequest, command: Command) => {
    const opts = command.optsWithGlobals<GlobalOptions>();
    const config = resolveScanConfig({
      probeTimeoutSeconds: opts.timeout,
      hostConcurrency: opts.hostConcurrency,
      subnetConcurrencyCap: opts.subnetConcurrency,
      policy: opts.policy,
    });
    const orchestrator = new ScanOrchestrator({
      probe: probeFactory(opts.probe),
      config,
      reporter: new ConsoleReporter(out),
    });

    const controller = new AbortController();
    deps.onController?.(controller);
    const onSigint = () => {
      logger.warn('interrupt received, finishing in-flight batch');
      controller.abort();
    };
    process.once('SIGINT', onSigint);
    try {
      const summary = await orchestrator.run(request, { signal: controller.signal });
      if (opts.metrics) out.write(`\n${await register.metrics()}`);
      state.exitCode = summary.cancelled && controller.signal.aborted ? EXIT_INTERRUPTED : 0;
    } finally {
      process.removeListener('SIGINT', onSigint);
    }
  };

  program
    .command('common')
    .description('sweep the predefined common private networks')
    .action((_opts: unknown, command: Command) => runScan({ mode: 'common' }, command));

  program
    .command('full')
    .description('sweep every 192.168.x.0/24 network')
    .action((_opts: unknown, command: Command) => runScan({ mode: 'full' }, command));

  program
    .command('quick')
    .description('sweep the most likely home and office networks')
    .action((_opts: unknown, command: Command) => runScan({ mode: 'quick' }, command));

  program
    .command('single')
    .description('sweep one subnet between two host numbers')
    .argument('[subnet]', 'three-octet prefix, e.g. 192.168.1', '192.168.50')
    .argument('[start]', 'first host number', parseHostNumber, 1)
    .argument('[end]', 'last host number', parseHostNumber, 254)
    .action((subnet: string, startHost: number, endHost: number, _opts: unknown, command: Command) =>
      runScan({ mode: 'single', subnet, startHost, endHost }, command),
    );

  return program;
}

/**
 * Run the CLI and resolve with the process exit code.
 */
export async function main(argv: string[] = process.argv, deps: CliDeps = {}): Promise<number> {
  const state = { exitCode: 0 };
  const program = createProgram(deps, state);
  const err = deps.err ?? process.stderr;
  try {
    await program.parseAsync(argv);
    return state.exitCode;
  } catch (e) {
    if (e instanceof CommanderError) {
      // help and version exit with 0; every parse error is a usage error
      return e.exitCode === 0 ? 0 : 2;
    }
    if (e instanceof UsageError) {
      err.write(`error: ${e.message}\n`);
      return e.exitCode;
    }
    const error = toError(e);
    logger.error({ err: error }, 'scan aborted by unexpected error');
    err.write(`error: ${error.message}\n`);
    return 1;
  }
}

if (require.main === module) {
  void main().then((code) => {
    process.exitCode = code;
  });
}
