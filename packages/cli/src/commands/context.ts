import type { Command } from 'commander';
import { ConsoleLogger, SilentLogger, type Logger } from '@plugver/shared';
import { OutputRenderer } from '../output/renderer';

export type GlobalOptions = {
  json?: boolean;
  verbose?: boolean;
};

/**
 * Mutable state shared between the program and its commands.
 */
export interface CliState {
  exitCode: number;
}

export function createLogger(program: Command, bindings: Record<string, unknown>): Logger {
  const opts = program.opts<GlobalOptions>();
  return opts.verbose ? new ConsoleLogger().child(bindings) : new SilentLogger();
}

export function createRenderer(program: Command): OutputRenderer {
  return new OutputRenderer(Boolean(program.opts<GlobalOptions>().json));
}
