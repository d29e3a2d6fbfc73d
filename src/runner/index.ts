export { runArtifact, invocationFor, type Invocation } from './runner.js';
export { buildChildEnv } from './environment.js';
