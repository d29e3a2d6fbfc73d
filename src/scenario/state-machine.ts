/**
 * State machine for one scenario.
 * Built → Located → Executed → (Verified) → Passed, or Failed from any
 * non-terminal state. No transition skips a stage.
 */

import { ScenarioEvent, ScenarioStage, ScenarioState } from '../types/index.js';

const transitions: Record<ScenarioState, Partial<Record<ScenarioEvent, ScenarioState>>> = {
  [ScenarioState.PENDING]: {
    [ScenarioEvent.BUILD_SUCCEEDED]: ScenarioState.BUILT,
    [ScenarioEvent.STAGE_FAILED]: ScenarioState.FAILED,
  },
  [ScenarioState.BUILT]: {
    [ScenarioEvent.ARTIFACTS_LOCATED]: ScenarioState.LOCATED,
    [ScenarioEvent.STAGE_FAILED]: ScenarioState.FAILED,
  },
  [ScenarioState.LOCATED]: {
    [ScenarioEvent.ARTIFACTS_EXECUTED]: ScenarioState.EXECUTED,
    [ScenarioEvent.STAGE_FAILED]: ScenarioState.FAILED,
  },
  [ScenarioState.EXECUTED]: {
    [ScenarioEvent.MANIFESTS_VERIFIED]: ScenarioState.VERIFIED,
    // No manifests for this scenario
    [ScenarioEvent.COMPLETED]: ScenarioState.PASSED,
    [ScenarioEvent.STAGE_FAILED]: ScenarioState.FAILED,
  },
  [ScenarioState.VERIFIED]: {
    [ScenarioEvent.COMPLETED]: ScenarioState.PASSED,
    [ScenarioEvent.STAGE_FAILED]: ScenarioState.FAILED,
  },
  [ScenarioState.PASSED]: {},
  [ScenarioState.FAILED]: {},
};

/**
 * Stage that runs next from a given state; a failure there is attributed to it.
 */
const pendingStage: Record<ScenarioState, ScenarioStage> = {
  [ScenarioState.PENDING]: ScenarioStage.BUILD,
  [ScenarioState.BUILT]: ScenarioStage.LOCATE,
  [ScenarioState.LOCATED]: ScenarioStage.EXECUTE,
  [ScenarioState.EXECUTED]: ScenarioStage.VERIFY,
  [ScenarioState.VERIFIED]: ScenarioStage.VERIFY,
  [ScenarioState.PASSED]: ScenarioStage.VERIFY,
  [ScenarioState.FAILED]: ScenarioStage.VERIFY,
};

export function isTerminalState(state: ScenarioState): boolean {
  return state === ScenarioState.PASSED || state === ScenarioState.FAILED;
}

export function canTransition(currentState: ScenarioState, event: ScenarioEvent): boolean {
  return event in transitions[currentState];
}

/**
 * Returns null if the transition is invalid.
 */
export function getNextState(currentState: ScenarioState, event: ScenarioEvent): ScenarioState | null {
  return transitions[currentState][event] ?? null;
}

export function stageForState(state: ScenarioState): ScenarioStage {
  return pendingStage[state];
}

export class InvalidTransitionError extends Error {
  readonly name = 'InvalidTransitionError';
  readonly state: ScenarioState;
  readonly event: ScenarioEvent;

  constructor(state: ScenarioState, event: ScenarioEvent) {
    super(`Invalid transition: ${state} + ${event}`);
    this.state = state;
    this.event = event;
    Object.setPrototypeOf(this, InvalidTransitionError.prototype);
  }
}

/**
 * @throws InvalidTransitionError if the event is not allowed in `state`
 */
export function applyTransition(state: ScenarioState, event: ScenarioEvent): ScenarioState {
  const next = getNextState(state, event);
  if (next === null) {
    throw new InvalidTransitionError(state, event);
  }
  return next;
}
