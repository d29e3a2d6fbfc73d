/**
 * packcheck configuration
 *
 * Reads all settings from environment variables with validation and defaults.
 */

import { z } from 'zod';
import { createLogger } from '../utils/logger.js';

const log = createLogger('config');

/**
 * Accepts the usual spellings of a boolean flag. `z.coerce.boolean()` would
 * turn the string "false" into `true`.
 */
const envBoolean = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const configSchema = z.object({
  // Packaging tool
  toolCommand: z.string().min(1).default('pyinstaller'),
  /** Environment variable through which the tool reads its config directory */
  toolConfigEnv: z.string().min(1).default('PYINSTALLER_CONFIG_DIR'),

  // Content listing
  listCommand: z.string().min(1).default('pyi-archive_viewer'),

  // Scenario inputs
  scriptsDir: z.string().min(1).default('scripts'),
  manifestsDir: z.string().min(1).optional(),

  /** Per-artifact execution limit; 0 disables the limit */
  runTimeoutMs: z.coerce.number().int().min(0).max(86_400_000).default(600_000),

  keepTemp: envBoolean.default('false'),
});

export type PackcheckConfig = z.infer<typeof configSchema>;

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): PackcheckConfig {
  const raw = {
    toolCommand: env['PACKCHECK_TOOL_COMMAND'],
    toolConfigEnv: env['PACKCHECK_TOOL_CONFIG_ENV'],
    listCommand: env['PACKCHECK_LIST_COMMAND'],
    scriptsDir: env['PACKCHECK_SCRIPTS_DIR'],
    manifestsDir: env['PACKCHECK_MANIFESTS_DIR'],
    runTimeoutMs: env['PACKCHECK_RUN_TIMEOUT_MS'],
    keepTemp: env['PACKCHECK_KEEP_TEMP']?.toLowerCase(),
  };

  const result = configSchema.safeParse(raw);

  if (!result.success) {
    log.error({ errors: result.error.errors }, 'Invalid configuration');
    throw new Error(`Configuration validation failed: ${result.error.message}`);
  }

  log.debug(
    {
      toolCommand: result.data.toolCommand,
      listCommand: result.data.listCommand,
      scriptsDir: result.data.scriptsDir,
      runTimeoutMs: result.data.runTimeoutMs,
    },
    'Configuration loaded'
  );

  return result.data;
}

let configInstance: PackcheckConfig | null = null;

/**
 * Get the configuration singleton
 */
export function getConfig(): PackcheckConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Reset configuration (for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}
