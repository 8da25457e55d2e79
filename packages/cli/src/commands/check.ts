import { Command } from 'commander';
import { parsePlugin } from '@plugver/plugins';
import type { CheckEntry } from '../output/renderer';
import { createLogger, createRenderer, type CliState } from './context';

export function registerCheckCommand(program: Command, state: CliState) {
  program
    .command('check')
    .description('Validate plugin identifiers of the form name:version')
    .argument('<plugins...>', 'Plugin identifiers, e.g. git:3.10.0')
    .action((plugins: string[]) => {
      const logger = createLogger(program, { cmd: 'check' });
      const entries: CheckEntry[] = plugins.map((input) => {
        const result = parsePlugin(input);
        if (result.ok) {
          return { input, valid: true };
        }
        logger.error(result.error, `Invalid plugin identifier ${input}`);
        return { input, valid: false, error: result.error.message };
      });

      createRenderer(program).renderCheck(entries);
      state.exitCode = entries.every((entry) => entry.valid) ? 0 : 2;
    });
}
