export {
  BuildOrchestrator,
  assembleToolArgs,
  createBuildRequest,
  type BuildOrchestratorOptions,
} from './orchestrator.js';
export {
  CommandPackagingTool,
  DEPENDENCY_GRAPH_ENV,
  DEPENDENCY_GRAPH_FILE,
  type PackagingTool,
  type CommandPackagingToolOptions,
} from './tool.js';
