/**
 * The `databricks-provision` command line.
 *
 * Each command reads its spec file, runs one orchestration and prints the
 * result as JSON on stdout. Diagnostics go to stderr. The exit code is 0 only
 * when the result is `SUCCEEDED`.
 */

import { readFile } from 'node:fs/promises';
import { Command, CommanderError, InvalidArgumentError } from 'commander';
import {
  createClientFromEnv,
  type ProvisioningClient,
  type ProvisioningClientDependencies,
} from '../client/index.js';
import { MAX_TIMER_MS } from '../clock/index.js';
import { isProvisioningClientError } from '../errors/index.js';
import { isRecord } from '../http/index.js';
import { ConsoleLogger, LogLevel } from '../observability/index.js';
import { serializeResult, type OrchestrationOptions } from '../orchestrator/index.js';
import type { DesiredSpec } from '../resources/index.js';
import {
  OperationStatus,
  RESOURCE_KIND_NAMES,
  isResourceKindName,
  type ProvisionResult,
  type ResourceKindName,
} from '../types/index.js';

interface CommonOptions {
  timeout?: number;
  interval?: number;
  budget?: number;
  verbose?: boolean;
}

interface ProvisionOptions extends CommonOptions {
  lookup?: boolean;
}

export interface CliIO {
  env: Readonly<Record<string, string | undefined>>;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  /** Aborting cancels the running orchestration */
  signal?: AbortSignal;
  /** Extra client dependencies (fetch, clock) */
  deps?: ProvisioningClientDependencies;
  readSpec?: (path: string) => Promise<string>;
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Not a positive integer.');
  }
  if (parsed > MAX_TIMER_MS) {
    throw new InvalidArgumentError(`Must be at most ${MAX_TIMER_MS}.`);
  }
  return parsed;
}

function parseKind(value: string): ResourceKindName {
  if (!isResourceKindName(value)) {
    throw new InvalidArgumentError(`Expected one of: ${RESOURCE_KIND_NAMES.join(', ')}.`);
  }
  return value;
}

/**
 * Build the `databricks-provision` command. Commands report their exit
 * status through `setExitCode` instead of exiting the process.
 */
export function createProgram(io: CliIO, setExitCode: (code: number) => void): Command {
  const readSpec = io.readSpec ?? ((path: string) => readFile(path, 'utf8'));

  const loadSpec = async (path: string): Promise<DesiredSpec> => {
    const parsed: unknown = JSON.parse(await readSpec(path));
    if (!isRecord(parsed)) {
      throw new Error(`${path} must contain a JSON object`);
    }
    return parsed;
  };

  const openClient = (options: ProvisionOptions): ProvisioningClient =>
    createClientFromEnv(io.env, {
      ...io.deps,
      logger:
        io.deps?.logger ??
        new ConsoleLogger('provision', options.verbose ? LogLevel.Debug : LogLevel.Warn),
      lookupExisting: options.lookup ?? false,
    });

  const orchestration = (options: CommonOptions): OrchestrationOptions => ({
    signal: io.signal,
    timeoutMs: options.timeout,
    intervalMs: options.interval,
    budgetMs: options.budget,
  });

  const report = (result: ProvisionResult): void => {
    io.stdout(JSON.stringify(serializeResult(result), null, 2));
    setExitCode(result.status === OperationStatus.SUCCEEDED ? 0 : 1);
  };

  const fail = (error: unknown): void => {
    const message = error instanceof Error ? error.message : String(error);
    io.stderr(isProvisioningClientError(error) ? message : `Error: ${message}`);
    setExitCode(1);
  };

  const program = new Command();
  program
    .name('databricks-provision')
    .description('Provision Databricks clusters, job runs and instance pools and wait for them to settle')
    .exitOverride()
    .configureOutput({ writeOut: io.stdout, writeErr: io.stderr });

  const withCommon = (command: Command): Command =>
    command
      .option('--timeout <ms>', 'give up waiting for a terminal state after this long', parsePositiveInt)
      .option('--interval <ms>', 'pause between status checks', parsePositiveInt)
      .option('--budget <ms>', 'wall-clock budget for the whole run', parsePositiveInt)
      .option('-v, --verbose', 'log progress to stderr');

  withCommon(
    program
      .command('provision')
      .description('Create a resource from a JSON spec and wait until it is ready')
      .argument('<kind>', RESOURCE_KIND_NAMES.join(' | '), parseKind)
      .argument('<spec-file>', 'path to the JSON desired spec')
      .option('--lookup', 'reuse an existing resource with the same name')
  ).action(async (kind: ResourceKindName, specFile: string, options: ProvisionOptions) => {
    try {
      const spec = await loadSpec(specFile);
      const client = openClient(options);
      report(await client.orchestratorFor(kind).provision(spec, orchestration(options)));
    } catch (error) {
      fail(error);
    }
  });

  withCommon(
    program
      .command('update')
      .description('Apply a JSON spec to an existing resource and wait until it settles')
      .argument('<kind>', RESOURCE_KIND_NAMES.join(' | '), parseKind)
      .argument('<id>', 'resource identifier')
      .argument('<spec-file>', 'path to the JSON desired spec')
  ).action(async (kind: ResourceKindName, id: string, specFile: string, options: CommonOptions) => {
    try {
      const spec = await loadSpec(specFile);
      const client = openClient(options);
      report(await client.orchestratorFor(kind).update(id, spec, orchestration(options)));
    } catch (error) {
      fail(error);
    }
  });

  withCommon(
    program
      .command('delete')
      .description('Delete a resource and wait until it is gone')
      .argument('<kind>', RESOURCE_KIND_NAMES.join(' | '), parseKind)
      .argument('<id>', 'resource identifier')
  ).action(async (kind: ResourceKindName, id: string, options: CommonOptions) => {
    try {
      const client = openClient(options);
      report(await client.orchestratorFor(kind).delete(id, orchestration(options)));
    } catch (error) {
      fail(error);
    }
  });

  return program;
}

/**
 * Parse `argv` (user arguments only) and run the selected command.
 * Resolves with the process exit code.
 */
export async function runCli(argv: readonly string[], io: CliIO): Promise<number> {
  let exitCode = 0;
  const program = createProgram(io, (code) => {
    exitCode = code;
  });
  try {
    await program.parseAsync([...argv], { from: 'user' });
  } catch (error) {
    // usage errors are already written to stderr by commander
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }
  return exitCode;
}

