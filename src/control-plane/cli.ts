import { Command } from 'commander';
import { createRunCommand } from './commands/run.js';
import { createLocateCommand } from './commands/locate.js';
import { createVerifyCommand } from './commands/verify.js';
import { ensureTmpDir } from '../utils/paths.js';

/**
 * Package version
 */
const VERSION = '0.1.0';

/**
 * Create and configure the CLI program.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('packcheck')
    .description('Build, run and verify the executables produced by a packaging tool')
    .version(VERSION, '-v, --version', 'Output the current version')
    .hook('preAction', async () => {
      await ensureTmpDir();
    });

  program.addCommand(createRunCommand());
  program.addCommand(createLocateCommand());
  program.addCommand(createVerifyCommand());

  program.exitOverride();

  return program;
}

/**
 * Run the CLI program.
 */
export async function runCli(args: string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(args);
  } catch (error) {
    // Commander throws on --help and --version
    if (
      error instanceof Error &&
      'code' in error &&
      (error.code === 'commander.helpDisplayed' ||
        error.code === 'commander.version')
    ) {
      return;
    }

    throw error;
  }
}

export { createRunCommand } from './commands/run.js';
export { createLocateCommand } from './commands/locate.js';
export { createVerifyCommand } from './commands/verify.js';
