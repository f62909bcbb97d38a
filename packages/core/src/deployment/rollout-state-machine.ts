/**
 * Rollout state machine
 * pending -> in-progress -> {stable | failed}, failed -> rolled-back
 */

import { InvalidTransitionError, logRolloutTransition, ROLLOUT_STATES } from '@tidewater/shared';
import type { RolloutState, RolloutTransition } from '@tidewater/shared';

const VALID_TRANSITIONS: Record<RolloutState, RolloutState[]> = {
  [ROLLOUT_STATES.PENDING]: [ROLLOUT_STATES.IN_PROGRESS, ROLLOUT_STATES.FAILED],
  [ROLLOUT_STATES.IN_PROGRESS]: [ROLLOUT_STATES.STABLE, ROLLOUT_STATES.FAILED],
  [ROLLOUT_STATES.FAILED]: [ROLLOUT_STATES.ROLLED_BACK],
  // Terminal states have no outgoing transitions
  [ROLLOUT_STATES.STABLE]: [],
  [ROLLOUT_STATES.ROLLED_BACK]: [],
};

export function isValidRolloutTransition(from: RolloutState, to: RolloutState): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

export function isTerminalRolloutState(state: RolloutState): boolean {
  return VALID_TRANSITIONS[state].length === 0;
}

export class RolloutStateMachine {
  private current: RolloutState = ROLLOUT_STATES.PENDING;
  private history: RolloutTransition[] = [];

  constructor(
    private readonly deploymentId: string,
    private readonly onTransition?: (transition: RolloutTransition) => void
  ) {}

  get state(): RolloutState {
    return this.current;
  }

  get transitions(): RolloutTransition[] {
    return [...this.history];
  }

  transition(to: RolloutState, reason?: string): void {
    if (!isValidRolloutTransition(this.current, to)) {
      throw new InvalidTransitionError(this.current, to, { deploymentId: this.deploymentId });
    }

    const transition: RolloutTransition = { from: this.current, to, at: new Date(), reason };
    this.history.push(transition);
    logRolloutTransition(this.deploymentId, this.current, to, reason);
    this.current = to;
    this.onTransition?.(transition);
  }
}
