/**
 * @fileoverview Unit tests for LifecycleController
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { LifecycleController } from './lifecycle.js';
import { AgentPhase } from '../types/index.js';

describe('LifecycleController', () => {
  let controller: LifecycleController;

  beforeEach(() => {
    controller = new LifecycleController();
  });

  describe('initial state', () => {
    it('should start in START phase', () => {
      expect(controller.getCurrentPhase()).toBe(AgentPhase.START);
      expect(controller.isTerminal()).toBe(false);
      expect(controller.phases()).toEqual([AgentPhase.START]);
    });
  });

  describe('transition()', () => {
    it('should follow a tool round trip', () => {
      controller.transition(AgentPhase.REASONING, 'Query recorded');
      controller.transition(AgentPhase.TOOL_DISPATCH, 'Action');
      controller.transition(AgentPhase.REASONING, 'Observation');

      expect(controller.getCurrentPhase()).toBe(AgentPhase.REASONING);
    });

    it('should allow REASONING to REASONING after a malformed step', () => {
      controller.transition(AgentPhase.REASONING, 'Query recorded');
      controller.transition(AgentPhase.REASONING, 'Malformed step');

      expect(controller.phases()).toEqual([AgentPhase.START, AgentPhase.REASONING, AgentPhase.REASONING]);
    });

    it('should throw on invalid transitions', () => {
      expect(() => controller.transition(AgentPhase.TOOL_DISPATCH, 'Invalid'))
        .toThrow("Invalid transition: 'START' → 'TOOL_DISPATCH'");
    });

    it('should not leave START for DONE', () => {
      expect(controller.canTransition(AgentPhase.DONE)).toBe(false);
    });

    it('should throw on transitions from terminal states', () => {
      controller.transition(AgentPhase.REASONING, 'Query recorded');
      controller.complete('Answered');

      expect(() => controller.transition(AgentPhase.REASONING, 'Again'))
        .toThrow("Cannot transition from terminal state 'DONE'");
    });

    it('should emit transition and error events', () => {
      const onTransition = vi.fn();
      const onError = vi.fn();
      controller.on('transition', onTransition);
      controller.on('error', onError);

      controller.transition(AgentPhase.REASONING, 'Starting');
      expect(() => controller.transition(AgentPhase.START, 'Back')).toThrow();

      expect(onTransition).toHaveBeenCalledWith(AgentPhase.START, AgentPhase.REASONING, 'Starting');
      expect(onError).toHaveBeenCalledWith(expect.objectContaining({
        code: 'INVALID_TRANSITION',
        attemptedTransition: AgentPhase.START,
      }));
    });
  });

  describe('abort()', () => {
    it('should end the run from REASONING', () => {
      controller.transition(AgentPhase.REASONING, 'Query recorded');
      controller.abort('Iteration limit reached');

      expect(controller.getCurrentPhase()).toBe(AgentPhase.ABORTED);
      expect(controller.isTerminal()).toBe(true);
    });
  });

  describe('fail()', () => {
    it('should transition to FAILED from any running state', () => {
      controller.transition(AgentPhase.REASONING, 'Query recorded');
      controller.transition(AgentPhase.TOOL_DISPATCH, 'Action');
      controller.fail('completion failed');

      expect(controller.getCurrentPhase()).toBe(AgentPhase.FAILED);
    });

    it('should do nothing from terminal states', () => {
      controller.transition(AgentPhase.REASONING, 'Query recorded');
      controller.complete('Answered');
      controller.fail('late error');

      expect(controller.getCurrentPhase()).toBe(AgentPhase.DONE);
    });
  });

  describe('phases()', () => {
    it('should record visited phases in order, the current one last', () => {
      controller.transition(AgentPhase.REASONING, 'Query recorded');
      controller.transition(AgentPhase.TOOL_DISPATCH, 'Action');
      controller.transition(AgentPhase.REASONING, 'Observation');
      controller.complete('Answered');

      expect(controller.phases()).toEqual([
        AgentPhase.START,
        AgentPhase.REASONING,
        AgentPhase.TOOL_DISPATCH,
        AgentPhase.REASONING,
        AgentPhase.DONE,
      ]);
    });

    it('should record FAILED when a run fails', () => {
      controller.fail('completion failed');

      expect(controller.phases()).toEqual([AgentPhase.START, AgentPhase.FAILED]);
    });

    it('should return a copy', () => {
      const phases = controller.phases();
      controller.transition(AgentPhase.REASONING, 'Query recorded');

      expect(phases).toEqual([AgentPhase.START]);
    });
  });
});
