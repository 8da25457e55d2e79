import { Command, CommanderError } from 'commander';
import { version } from '../package.json';
import { AppError, UsageError, exitCodeFor } from '@plugver/shared';
import {
  registerVerifyCommand,
  registerCheckCommand,
  type CliState,
  type GlobalOptions,
} from './commands';

export function createProgram(state: CliState): Command {
  const program = new Command();

  program
    .name('plugver')
    .description('Validate plugin identities and detect dependency version conflicts')
    .version(version)
    .option('--json', 'Output results as JSON')
    .option('--verbose', 'Enable verbose logging')
    // usage problems are reported through reportError
    .configureOutput({ outputError: () => {} })
    .exitOverride();

  registerVerifyCommand(program, state);
  registerCheckCommand(program, state);

  return program;
}

function reportError(e: unknown, opts: GlobalOptions): void {
  if (opts.json) {
    console.log(
      JSON.stringify({
        error: {
          code: e instanceof AppError ? e.code : 'UnknownError',
          message: e instanceof Error ? e.message : String(e),
          ...(e instanceof AppError && e.details ? { details: e.details } : {}),
        },
      }),
    );
    return;
  }

  console.error(`❌ Error: ${(e instanceof Error && e.message) || String(e)}`);
  if (e instanceof AppError && e.details) {
    console.error(
      `  Details: ${typeof e.details === 'string' ? e.details : JSON.stringify(e.details, null, 2)}`,
    );
  }
  if (opts.verbose && e instanceof Error && e.stack) {
    console.error(`\nStack Trace:\n${e.stack}`);
  } else {
    console.error(`\nFor more details, run with the --verbose flag.`);
  }
}

/**
 * Run the CLI with user arguments (no node/script prefix) and resolve to the exit code.
 */
export async function run(argv: string[]): Promise<number> {
  const state: CliState = { exitCode: 0 };
  const program = createProgram(state);

  try {
    await program.parseAsync(argv, { from: 'user' });
    return state.exitCode;
  } catch (e) {
    // help and version have already been printed
    if (e instanceof CommanderError && e.exitCode === 0) {
      return 0;
    }
    const error = e instanceof CommanderError ? new UsageError(e.message, { cause: e }) : e;
    reportError(error, program.opts<GlobalOptions>());
    return exitCodeFor(error);
  }
}
