export { logger, createLogger } from './logger.js';
export { getPackcheckRoot, setPackcheckRoot, getTmpDir, ensureTmpDir } from './paths.js';
export {
  createTempDir,
  removeTempDir,
  listTempDirs,
} from './temp.js';
