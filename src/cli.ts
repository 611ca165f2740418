#!/usr/bin/env node
/**
 * harbormaster CLI - Composition Root
 *
 * This is a thin composition root that:
 * 1. Wires dependencies for each command
 * 2. Interprets CliResult into process termination
 * 3. Contains NO business logic
 *
 * All business logic lives in src/cli/commands/*.ts
 */

import { Command } from 'commander';
import fs from 'fs';
import { ResultAsync } from 'neverthrow';

import { buildPierContext, container, createPortIssuers, initializeContainer } from './di/container.js';
import { DI } from './di/tokens.js';
import type { PierContext } from './domain/pier-context.js';
import type { ProcessTerminator } from './runtime/ports/process-terminator.js';
import type { ProcessSignals } from './runtime/ports/process-signals.js';
import type { ShutdownEvents, ShutdownSignal } from './runtime/ports/shutdown-events.js';
import type { ILoggerFactory } from './core/logging/index.js';
import { Err, formatAppError } from './errors/index.js';

import { interpretCliResult, interpretCliResultWithoutDI } from './cli/interpret-result.js';
import { failure } from './cli/types/cli-result.js';
import {
  executeCommissionCommand,
  executeListCommand,
  executeProvisionCommand,
  executeRunCommand,
  pierFailure,
} from './cli/commands/index.js';

// ═══════════════════════════════════════════════════════════════════════════
// WIRING
// ═══════════════════════════════════════════════════════════════════════════

interface CliEnvironment {
  readonly terminator: ProcessTerminator;
  readonly ctx: PierContext;
}

/**
 * Builds the container and opens the harbor. Prints and exits on failure.
 */
async function prepare(): Promise<CliEnvironment | null> {
  const configError = initializeContainer({ runtimeMode: { kind: 'cli' } });
  if (configError !== null) {
    interpretCliResultWithoutDI(failure(formatAppError(configError), { exitCode: { kind: 'misuse' } }));
    return null;
  }

  const terminator = container.resolve<ProcessTerminator>(DI.Runtime.ProcessTerminator);
  const ctx = await buildPierContext();
  if (ctx.isErr()) {
    interpretCliResult(pierFailure('open harbor', ctx.error), terminator);
    return null;
  }
  return { terminator, ctx: ctx.value };
}

function readUpload(filePath: string): ResultAsync<Uint8Array, { readonly message: string }> {
  return ResultAsync.fromPromise(fs.promises.readFile(filePath), (e) => ({
    message: e instanceof Error ? e.message : String(e),
  })).map((buffer) => new Uint8Array(buffer));
}

function waitForShutdown(): Promise<ShutdownSignal> {
  const signals = container.resolve<ProcessSignals>(DI.Runtime.ProcessSignals);
  const events = container.resolve<ShutdownEvents>(DI.Runtime.ShutdownEvents);

  signals.on('SIGINT', () => events.emit({ kind: 'shutdown_requested', signal: 'SIGINT' }));
  signals.on('SIGTERM', () => events.emit({ kind: 'shutdown_requested', signal: 'SIGTERM' }));

  return new Promise((resolve) => {
    const unsubscribe = events.onShutdown((event) => {
      unsubscribe();
      resolve(event.signal);
    });
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// PROGRAM DEFINITION
// ═══════════════════════════════════════════════════════════════════════════

const program = new Command();

program
  .name('harbormaster')
  .description('Stage, commission and run ships in a harbor of piers')
  .version('0.1.0');

program
  .command('list')
  .description('List live piers')
  .option('-s, --staged', 'Also list pier ids waiting in the dry dock')
  .action(async (options: { staged?: boolean }) => {
    const env = await prepare();
    if (env === null) return;

    const result = await executeListCommand(
      {
        listLivePiers: () => env.ctx.harbor.listLivePiers(),
        listStagedPiers: () => env.ctx.harbor.listStagedPiers(),
      },
      { staged: options.staged }
    );

    interpretCliResult(result, env.terminator);
  });

const provision = program.command('provision').description('Stage a new pier in the dry dock');

provision
  .command('keyfile <file>')
  .description('Stage a pier that boots from a keyfile')
  .requiredOption('-n, --name <name>', 'Ship name the keyfile belongs to')
  .option('--sha256 <digest>', 'Reject the upload unless it hashes to this digest')
  .option('-r, --runtime-version <version>', 'Runtime version for this pier (default v1.9)')
  .action(async (file: string, options: { name: string; sha256?: string; runtimeVersion?: string }) => {
    const env = await prepare();
    if (env === null) return;

    const result = await executeProvisionCommand(
      { kind: 'keyfile', file, name: options.name },
      { ctx: env.ctx, readUpload },
      options
    );
    interpretCliResult(result, env.terminator);
  });

provision
  .command('archive <file>')
  .description('Stage a pier from an exported pier archive (.tar / .tgz)')
  .option('--sha256 <digest>', 'Reject the upload unless it hashes to this digest')
  .option('-r, --runtime-version <version>', 'Runtime version for this pier (default v1.9)')
  .action(async (file: string, options: { sha256?: string; runtimeVersion?: string }) => {
    const env = await prepare();
    if (env === null) return;

    const result = await executeProvisionCommand({ kind: 'archive', file }, { ctx: env.ctx, readUpload }, options);
    interpretCliResult(result, env.terminator);
  });

provision
  .command('comet')
  .description('Stage a pier that boots as a new comet')
  .option('-r, --runtime-version <version>', 'Runtime version for this pier (default v1.9)')
  .action(async (options: { runtimeVersion?: string }) => {
    const env = await prepare();
    if (env === null) return;

    const result = await executeProvisionCommand({ kind: 'comet' }, { ctx: env.ctx, readUpload }, options);
    interpretCliResult(result, env.terminator);
  });

program
  .command('commission <id>')
  .description('Boot a staged pier, learn its name and move it into port')
  .action(async (id: string) => {
    const env = await prepare();
    if (env === null) return;

    const issuers = createPortIssuers();
    const result = await executeCommissionCommand(id, {
      ctx: env.ctx,
      serviceIssuer: issuers.service,
      peerIssuer: issuers.peer,
    });
    interpretCliResult(result, env.terminator);
  });

program
  .command('run <name>')
  .description('Run a live pier until SIGINT/SIGTERM')
  .action(async (name: string) => {
    const env = await prepare();
    if (env === null) return;

    const issuers = createPortIssuers();
    const logger = container.resolve<ILoggerFactory>(DI.Logging.Factory).create('cli');
    const result = await executeRunCommand(name, {
      ctx: env.ctx,
      serviceIssuer: issuers.service,
      peerIssuer: issuers.peer,
      waitForShutdown,
      onLaunched: (ship) => {
        logger.info({ pid: ship.pid, ...ship.ports }, 'ship is running; press Ctrl+C to stop');
      },
    });
    interpretCliResult(result, env.terminator);
  });

// ═══════════════════════════════════════════════════════════════════════════
// ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════

void program.parseAsync().catch((error: unknown) => {
  console.error(formatAppError(Err.unexpected('harbormaster stopped on an unhandled error', error)));
  process.exit(1);
});
