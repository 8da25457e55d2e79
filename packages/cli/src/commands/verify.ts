import { Command } from 'commander';
import { verifyDependencies, sortMessages, type DependencyMap } from '@plugver/plugins';
import { loadManifest } from '../manifest/loader';
import { createLogger, createRenderer, type CliState } from './context';

interface VerifyOptions {
  sort?: boolean;
  warnOnly?: boolean;
}

export function registerVerifyCommand(program: Command, state: CliState) {
  program
    .command('verify')
    .description('Check dependency manifests for plugin version conflicts')
    .argument('<manifests...>', 'YAML or JSON manifest files, verified together')
    .option('--sort', 'Sort conflict messages for reproducible output')
    .option('--warn-only', 'Report conflicts without a failing exit code')
    .action(async (manifests: string[], options: VerifyOptions) => {
      const logger = createLogger(program, { cmd: 'verify' });

      const mappings: DependencyMap[] = [];
      for (const manifest of manifests) {
        mappings.push(await loadManifest(manifest, logger.child({ file: manifest })));
      }

      const found = verifyDependencies(...mappings);
      const conflicts = options.sort ? sortMessages(found) : found;
      logger.info(`${conflicts.length} conflict message(s) across ${manifests.length} manifest(s)`);

      createRenderer(program).renderVerification({ manifests, conflicts });
      state.exitCode = conflicts.length > 0 && !options.warnOnly ? 1 : 0;
    });
}
