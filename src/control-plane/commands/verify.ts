import { Command, Option } from 'commander';
import { getConfig } from '../../config/index.js';
import { locate } from '../../locator/locator.js';
import { detectPlatform } from '../../platform/index.js';
import { createCommandLister } from '../../manifest/lister.js';
import { discoverManifests } from '../../manifest/discovery.js';
import { loadManifests } from '../../manifest/parser.js';
import { verifyManifests } from '../../manifest/verifier.js';
import { inspectCommandOptionsSchema, validate } from '../validators.js';
import {
  formatError,
  formatJson,
  formatSuccess,
  formatVerifyOutcome,
  formatWarning,
  print,
  printError,
} from '../formatter.js';

/**
 * Create the verify command: check manifests of an existing build without
 * rebuilding or running anything.
 */
export function createVerifyCommand(): Command {
  const command = new Command('verify')
    .description('Check the content listing of built executables against their manifests')
    .argument('<dist-dir>', 'Output directory of a build')
    .argument('<name>', 'Executable base name')
    .option('--manifests-dir <dir>', 'Directory holding .toc manifests')
    .option('--manifest-name <name>', 'Base name for manifest discovery (defaults to <name>)')
    .addOption(
      new Option('--platform <platform>', 'Naming conventions to apply').choices([
        'windows',
        'macos',
        'unix',
      ])
    )
    .option('--json', 'Output as JSON', false)
    .action(async (distDir: string, name: string, rawOptions: Record<string, unknown>) => {
      try {
        const validation = validate(inspectCommandOptionsSchema, rawOptions);
        if (!validation.success) {
          for (const error of validation.errors) {
            printError(formatError(`${error.path}: ${error.message}`));
          }
          process.exitCode = 2;
          return;
        }

        const options = validation.data;
        const config = getConfig();
        const manifestsDir = options.manifestsDir ?? config.manifestsDir ?? config.scriptsDir;

        const artifacts = await locate(distDir, name, options.platform ?? detectPlatform());
        if (artifacts.length === 0) {
          printError(formatError('No executable file was found.'));
          process.exitCode = 1;
          return;
        }

        const manifestPaths = await discoverManifests(manifestsDir, options.manifestName ?? name);
        if (manifestPaths.length === 0) {
          print(formatWarning(`No manifests for ${name} in ${manifestsDir}`));
          return;
        }

        const manifests = await loadManifests(manifestPaths);
        const outcome = await verifyManifests(
          artifacts,
          manifests,
          createCommandLister(config.listCommand)
        );

        if (options.json) {
          print(formatJson(outcome));
        } else {
          print(formatVerifyOutcome(outcome));
          print(outcome.ok ? formatSuccess('All manifests matched') : formatError('Manifest mismatch'));
        }

        if (!outcome.ok) {
          process.exitCode = 1;
        }
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });

  return command;
}
