/**
 * Scenario State Machine Tests
 */

import { describe, it, expect } from 'vitest';
import {
  InvalidTransitionError,
  applyTransition,
  canTransition,
  getNextState,
  isTerminalState,
  stageForState,
} from '../src/scenario/index.js';
import { ScenarioEvent, ScenarioStage, ScenarioState } from '../src/types/index.js';

describe('Scenario state machine', () => {
  it('should walk the full path to passed', () => {
    let state: ScenarioState = ScenarioState.PENDING;
    for (const event of [
      ScenarioEvent.BUILD_SUCCEEDED,
      ScenarioEvent.ARTIFACTS_LOCATED,
      ScenarioEvent.ARTIFACTS_EXECUTED,
      ScenarioEvent.MANIFESTS_VERIFIED,
      ScenarioEvent.COMPLETED,
    ]) {
      state = applyTransition(state, event);
    }
    expect(state).toBe(ScenarioState.PASSED);
  });

  it('should allow completion without manifests', () => {
    expect(getNextState(ScenarioState.EXECUTED, ScenarioEvent.COMPLETED)).toBe(ScenarioState.PASSED);
  });

  it('should not skip stages', () => {
    expect(canTransition(ScenarioState.PENDING, ScenarioEvent.ARTIFACTS_LOCATED)).toBe(false);
    expect(canTransition(ScenarioState.BUILT, ScenarioEvent.COMPLETED)).toBe(false);
    expect(() => applyTransition(ScenarioState.LOCATED, ScenarioEvent.COMPLETED)).toThrow(
      InvalidTransitionError
    );
  });

  it('should fail from every non-terminal state', () => {
    for (const state of [
      ScenarioState.PENDING,
      ScenarioState.BUILT,
      ScenarioState.LOCATED,
      ScenarioState.EXECUTED,
      ScenarioState.VERIFIED,
    ]) {
      expect(applyTransition(state, ScenarioEvent.STAGE_FAILED)).toBe(ScenarioState.FAILED);
    }
  });

  it('should have no transitions out of terminal states', () => {
    expect(isTerminalState(ScenarioState.PASSED)).toBe(true);
    expect(isTerminalState(ScenarioState.FAILED)).toBe(true);
    expect(isTerminalState(ScenarioState.EXECUTED)).toBe(false);
    expect(getNextState(ScenarioState.PASSED, ScenarioEvent.STAGE_FAILED)).toBeNull();
    expect(getNextState(ScenarioState.FAILED, ScenarioEvent.COMPLETED)).toBeNull();
  });

  it('should attribute failures to the stage that runs next', () => {
    expect(stageForState(ScenarioState.PENDING)).toBe(ScenarioStage.BUILD);
    expect(stageForState(ScenarioState.BUILT)).toBe(ScenarioStage.LOCATE);
    expect(stageForState(ScenarioState.LOCATED)).toBe(ScenarioStage.EXECUTE);
    expect(stageForState(ScenarioState.EXECUTED)).toBe(ScenarioStage.VERIFY);
  });

  it('should name the state and event in the error', () => {
    expect(() => applyTransition(ScenarioState.PASSED, ScenarioEvent.COMPLETED)).toThrow(
      'Invalid transition: passed + completed'
    );
  });
});
