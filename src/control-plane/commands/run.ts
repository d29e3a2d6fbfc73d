import { mkdir } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { Command, Option } from 'commander';
import { getConfig } from '../../config/index.js';
import { CommandPackagingTool } from '../../builder/tool.js';
import { createCommandLister } from '../../manifest/lister.js';
import { BundleScenario } from '../../scenario/scenario.js';
import { createTempDir, removeTempDir } from '../../utils/temp.js';
import { ScenarioState, type ScenarioReport } from '../../types/index.js';
import { runCommandOptionsSchema, selectModes, validate, type RunCommandOptions } from '../validators.js';
import {
  bold,
  formatError,
  formatJson,
  formatScenarioReport,
  formatSuccess,
  print,
  printError,
  red,
  toReportJson,
} from '../formatter.js';

/**
 * Create the run command.
 */
export function createRunCommand(): Command {
  const command = new Command('run')
    .description('Package a script, run every executable it produces and check its manifests')
    .argument('<script>', 'Script to package, relative to the scripts directory')
    .addOption(
      new Option('-m, --mode <mode>', 'Bundle mode to test')
        .choices(['onedir', 'onefile', 'all'])
        .default('all')
    )
    .option('-n, --name <name>', 'Executable name (defaults to the script name)')
    .option('--manifest-name <name>', 'Base name for manifest discovery (defaults to the executable name)')
    .option('--tool-arg <arg...>', 'Extra argument for the packaging tool')
    .option('--app-arg <arg...>', 'Argument passed to every built executable')
    .option('--scripts-dir <dir>', 'Directory scripts are resolved against')
    .option('--manifests-dir <dir>', 'Directory holding .toc manifests')
    .option('--work-dir <dir>', 'Build under <dir>/<mode> instead of a temp directory (never removed)')
    .option('--timeout <ms>', 'Per-executable time limit in milliseconds (0 disables)')
    .option('--keep', 'Keep scenario directories after the run', false)
    .option('--json', 'Output reports as JSON', false)
    .action(async (script: string, rawOptions: Record<string, unknown>) => {
      try {
        const validation = validate(runCommandOptionsSchema, rawOptions);
        if (!validation.success) {
          for (const error of validation.errors) {
            printError(formatError(`${error.path}: ${error.message}`));
          }
          process.exitCode = 2;
          return;
        }

        const reports = await executeRun(script, validation.data);
        if (reports.some((r) => r.state !== ScenarioState.PASSED)) {
          process.exitCode = 1;
        }
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });

  return command;
}

async function ensureWorkDir(base: string, mode: string): Promise<string> {
  const dir = join(resolve(base), mode);
  await mkdir(dir, { recursive: true });
  return dir;
}

/**
 * Run one scenario per selected bundle mode, each in its own directory.
 */
export async function executeRun(script: string, options: RunCommandOptions): Promise<ScenarioReport[]> {
  const config = getConfig();
  const scriptsDir = options.scriptsDir ?? config.scriptsDir;
  const manifestsDir = options.manifestsDir ?? config.manifestsDir ?? scriptsDir;
  const keep = options.keep || config.keepTemp;

  const tool = new CommandPackagingTool({
    command: config.toolCommand,
    configEnv: config.toolConfigEnv,
  });
  const lister = createCommandLister(config.listCommand);

  const reports: ScenarioReport[] = [];

  for (const mode of selectModes(options.mode)) {
    const workDir =
      options.workDir === undefined
        ? await createTempDir(`scenario-${mode}`)
        : await ensureWorkDir(options.workDir, mode);
    const isTemp = options.workDir === undefined;

    try {
      const scenario = new BundleScenario({
        workDir,
        mode,
        tool,
        lister,
        scriptsDir,
        manifestsDir,
        runTimeoutMs: options.timeout ?? config.runTimeoutMs,
      });

      const report = await scenario.run(script, {
        appName: options.name,
        manifestName: options.manifestName,
        toolArgs: options.toolArg,
        appArgs: options.appArg,
      });
      reports.push(report);

      if (!options.json) {
        print(formatScenarioReport(report));
        if (keep || !isTemp) {
          print(`  kept ${workDir}`);
        }
      }
    } finally {
      if (isTemp && !keep) {
        await removeTempDir(workDir);
      }
    }
  }

  if (options.json) {
    print(formatJson(reports.map(toReportJson)));
  } else {
    const failed = reports.filter((r) => r.state !== ScenarioState.PASSED).length;
    print('');
    print(
      failed === 0
        ? formatSuccess(`${reports.length} scenario(s) passed`)
        : `${red('✗')} ${bold(`${failed} of ${reports.length} scenario(s) failed`)}`
    );
  }

  return reports;
}
