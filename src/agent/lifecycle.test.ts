/**
 * @fileoverview Unit tests for LifecycleController
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { LifecycleController, LifecycleTransitionError } from './lifecycle.js';
import { RunPhase, createUniqueId } from '../types/index.js';

describe('LifecycleController', () => {
  let controller: LifecycleController;

  function runOneToolIteration(): void {
    controller.transition(RunPhase.PLANNING, 'Plan');
    controller.transition(RunPhase.ACTING, 'Act');
    controller.transition(RunPhase.OBSERVING, 'Observe');
  }

  beforeEach(() => {
    controller = new LifecycleController(createUniqueId('run-1'));
  });

  describe('initial state', () => {
    it('should start in IDLE with no iterations', () => {
      const state = controller.getState();

      expect(state.runId).toBe('run-1');
      expect(state.currentPhase).toBe(RunPhase.IDLE);
      expect(state.previousPhase).toBeNull();
      expect(state.iteration).toBe(0);
      expect(state.isTerminal).toBe(false);
    });
  });

  describe('transition()', () => {
    it('should loop through a tool iteration back to PLANNING', () => {
      runOneToolIteration();
      controller.transition(RunPhase.PLANNING, 'Next');

      expect(controller.getCurrentPhase()).toBe(RunPhase.PLANNING);
      expect(controller.getIteration()).toBe(2);
    });

    it('should allow PLANNING to PLANNING for a planner retry', () => {
      controller.transition(RunPhase.PLANNING, 'Plan');
      controller.transition(RunPhase.PLANNING, 'Retry');

      expect(controller.getIteration()).toBe(2);
    });

    it('should reach COMPLETE through SYNTHESIZING', () => {
      controller.transition(RunPhase.PLANNING, 'Plan');
      controller.transition(RunPhase.SYNTHESIZING, 'Finalize');
      controller.transition(RunPhase.COMPLETE, 'Done');

      expect(controller.isTerminal()).toBe(true);
    });

    it('should let a cancelled run synthesize before ending CANCELLED', () => {
      controller.transition(RunPhase.PLANNING, 'Plan');
      controller.transition(RunPhase.SYNTHESIZING, 'Cancelled');
      controller.transition(RunPhase.CANCELLED, 'Cancelled');

      expect(controller.getCurrentPhase()).toBe(RunPhase.CANCELLED);
      expect(controller.isTerminal()).toBe(true);
    });

    it('should reject skipping from IDLE to ACTING', () => {
      expect(() => controller.transition(RunPhase.ACTING, 'Invalid')).toThrow(
        "Invalid transition: 'IDLE' → 'ACTING'",
      );
    });

    it('should reject cancelling while a tool is in flight', () => {
      controller.transition(RunPhase.PLANNING, 'Plan');
      controller.transition(RunPhase.ACTING, 'Act');

      expect(controller.canTransition(RunPhase.CANCELLED)).toBe(false);
    });

    it('should reject transitions out of terminal states', () => {
      controller.transition(RunPhase.PLANNING, 'Plan');
      controller.transition(RunPhase.CANCELLED, 'Stop');

      expect(() => controller.transition(RunPhase.PLANNING, 'Again')).toThrow(LifecycleTransitionError);
    });

    it('should emit transition and error events', () => {
      const onTransition = vi.fn();
      const onError = vi.fn();
      controller.on('transition', onTransition);
      controller.on('error', onError);

      controller.transition(RunPhase.PLANNING, 'Starting');
      expect(() => controller.transition(RunPhase.OBSERVING, 'Skip')).toThrow();

      expect(onTransition).toHaveBeenCalledWith(RunPhase.IDLE, RunPhase.PLANNING, 'Starting');
      expect(onError).toHaveBeenCalledWith({
        code: 'INVALID_TRANSITION',
        message: "Invalid transition: 'PLANNING' → 'OBSERVING'",
        phase: RunPhase.PLANNING,
        attemptedTransition: RunPhase.OBSERVING,
      });
    });

    it('should record exited phases in the history', () => {
      runOneToolIteration();

      const history = controller.getState().phaseHistory;
      expect(history.map(entry => entry.phase)).toEqual([RunPhase.IDLE, RunPhase.PLANNING, RunPhase.ACTING]);
      expect(history.every(entry => entry.exitedAt !== null)).toBe(true);
    });
  });

  describe('fail()', () => {
    it('should force FAILED from a non-terminal phase', () => {
      controller.transition(RunPhase.PLANNING, 'Plan');
      controller.transition(RunPhase.ACTING, 'Act');
      const handler = vi.fn();
      controller.on('transition', handler);

      controller.fail('unexpected');

      expect(controller.getCurrentPhase()).toBe(RunPhase.FAILED);
      expect(handler).toHaveBeenCalledWith(RunPhase.ACTING, RunPhase.FAILED, 'unexpected');
    });

    it('should do nothing once terminal', () => {
      controller.transition(RunPhase.PLANNING, 'Plan');
      controller.transition(RunPhase.SYNTHESIZING, 'Finalize');
      controller.transition(RunPhase.COMPLETE, 'Done');

      controller.fail('late');

      expect(controller.getCurrentPhase()).toBe(RunPhase.COMPLETE);
    });
  });

  describe('phase events', () => {
    it('should emit phase:exit for the old phase and phase:enter for the new one', () => {
      const onEnter = vi.fn();
      const onExit = vi.fn();
      controller.on('phase:enter', onEnter);
      controller.on('phase:exit', onExit);

      controller.transition(RunPhase.PLANNING, 'Starting', { step: 1 });

      expect(onExit).toHaveBeenCalledWith(RunPhase.IDLE, expect.objectContaining({ reason: 'Run created' }));
      expect(onEnter).toHaveBeenCalledWith(
        RunPhase.PLANNING,
        expect.objectContaining({ reason: 'Starting', iteration: 1, data: { step: 1 } }),
      );
    });
  });
});
