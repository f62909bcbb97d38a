/**
 * Rollout State Machine Tests
 */
import { describe, it, expect, vi } from 'vitest';
import { InvalidTransitionError } from '@tidewater/shared';
import { isTerminalRolloutState, isValidRolloutTransition, RolloutStateMachine } from './rollout-state-machine.js';

describe('RolloutStateMachine', () => {
  it('should start pending', () => {
    expect(new RolloutStateMachine('dep-1').state).toBe('pending');
  });

  it('should follow the happy path and record transitions', () => {
    const onTransition = vi.fn();
    const machine = new RolloutStateMachine('dep-1', onTransition);

    machine.transition('in-progress', 'descriptor applied');
    machine.transition('stable');

    expect(machine.state).toBe('stable');
    expect(machine.transitions.map((t) => [t.from, t.to])).toEqual([
      ['pending', 'in-progress'],
      ['in-progress', 'stable'],
    ]);
    expect(onTransition).toHaveBeenCalledTimes(2);
  });

  it('should allow rollback only from failed', () => {
    const machine = new RolloutStateMachine('dep-1');
    machine.transition('in-progress');
    machine.transition('failed', 'timeout');
    machine.transition('rolled-back');

    expect(machine.state).toBe('rolled-back');
  });

  it('should throw on invalid transitions', () => {
    const machine = new RolloutStateMachine('dep-1');

    expect(() => machine.transition('stable')).toThrow(InvalidTransitionError);
    expect(() => machine.transition('rolled-back')).toThrow('Invalid state transition: pending -> rolled-back');
  });

  it('should treat stable and rolled-back as terminal', () => {
    expect(isTerminalRolloutState('stable')).toBe(true);
    expect(isTerminalRolloutState('rolled-back')).toBe(true);
    expect(isTerminalRolloutState('failed')).toBe(false);
    expect(isValidRolloutTransition('stable', 'failed')).toBe(false);
  });
});
