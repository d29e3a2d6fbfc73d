import { Command, Option } from 'commander';
import { locate } from '../../locator/locator.js';
import { detectPlatform } from '../../platform/index.js';
import { inspectCommandOptionsSchema, validate } from '../validators.js';
import { formatArtifactList, formatError, formatJson, print, printError } from '../formatter.js';

/**
 * Create the locate command.
 */
export function createLocateCommand(): Command {
  const command = new Command('locate')
    .description('List the executables found for a name in a dist directory')
    .argument('<dist-dir>', 'Output directory of a build')
    .argument('<name>', 'Executable base name')
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
        const artifacts = await locate(distDir, name, options.platform ?? detectPlatform());

        print(options.json ? formatJson(artifacts) : formatArtifactList(artifacts));
        if (artifacts.length === 0) {
          process.exitCode = 1;
        }
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });

  return command;
}
