/**
 * Task Executor Unit Tests
 */

import { describe, it, expect, vi } from 'vitest';
import {
  TaskExecutor,
  recordTaskOutcome,
  isCustomTask,
  CUSTOM_TASK_DECISION,
  DEFAULT_DECISION_REASON,
} from '../src/workflow/task-executor.js';
import { OperationRegistry } from '../src/operations/registry.js';
import type { OperationResult, PhaseSummary } from '../src/types/index.js';
import { makeState, makeTask } from './support/fixtures.js';

function registryWith(
  name: string,
  handler: (params: Record<string, unknown>) => OperationResult | Promise<OperationResult>
): OperationRegistry {
  const registry = new OperationRegistry();
  registry.register({ name, handler });
  return registry;
}

function emptySummary(): PhaseSummary {
  return { tasksCompleted: 0, tasksFailed: 0, decisionsRecorded: 0 };
}

describe('isCustomTask', () => {
  it('should treat blank and custom methods as custom', () => {
    expect(isCustomTask(makeTask({ id: 'a' }))).toBe(true);
    expect(isCustomTask(makeTask({ id: 'a', method: '  ' }))).toBe(true);
    expect(isCustomTask(makeTask({ id: 'a', method: 'custom' }))).toBe(true);
    expect(isCustomTask(makeTask({ id: 'a', method: 'createSheet' }))).toBe(false);
  });
});

describe('TaskExecutor', () => {
  describe('custom tasks', () => {
    it('should succeed with the hint as the decision reason', async () => {
      const executor = new TaskExecutor({ operations: new OperationRegistry() });
      const execution = await executor.execute(
        makeState(),
        makeTask({ id: 't1', method: 'custom', autonomous_decision: 'pick default title block' })
      );

      expect(execution.result.success).toBe(true);
      if (execution.result.success) {
        expect(execution.result.decision).toMatchObject({
          task: 't1',
          decision: CUSTOM_TASK_DECISION,
          reason: 'pick default title block',
        });
      }
      expect(execution.dispatchedParameters).toBeNull();
      expect(execution.outputs).toEqual({});
    });

    it('should fall back to the default reason without a hint', async () => {
      const executor = new TaskExecutor({ operations: new OperationRegistry() });
      const execution = await executor.execute(makeState(), makeTask({ id: 't1' }));

      expect(execution.result).toMatchObject({
        success: true,
        decision: { decision: CUSTOM_TASK_DECISION, reason: DEFAULT_DECISION_REASON },
      });
    });
  });

  describe('dispatched tasks', () => {
    it('should inject context and collect outputs', async () => {
      const handler = vi.fn((): OperationResult => ({ success: true, viewId: 12 }));
      const executor = new TaskExecutor({ operations: registryWith('placeViewOnSheet', handler) });
      const state = makeState({ context: { lastSheetId: 7 } });

      const execution = await executor.execute(
        state,
        makeTask({ id: 't2', method: 'placeViewOnSheet', parameters: { scale: 96 } })
      );

      expect(handler).toHaveBeenCalledWith(
        { scale: 96, sheetId: 7 },
        { workflowId: 'wf-1', taskId: 't2' }
      );
      expect(execution.result).toEqual({ success: true, decision: null });
      expect(execution.outputs).toEqual({ lastViewId: 12 });
      expect(execution.dispatchedParameters).toEqual({ scale: 96, sheetId: 7 });
    });

    it('should record a decision only when the task carries a hint', async () => {
      const executor = new TaskExecutor({
        operations: registryWith('createSheet', () => ({ success: true })),
      });

      const execution = await executor.execute(
        makeState(),
        makeTask({ id: 't3', method: 'createSheet', autonomous_decision: 'number from A-101' })
      );

      expect(execution.result).toMatchObject({
        success: true,
        decision: {
          task: 't3',
          decision: 'Executed createSheet successfully',
          reason: 'number from A-101',
        },
      });
    });

    it('should use the operation error message', async () => {
      const executor = new TaskExecutor({
        operations: registryWith('createSheet', () => ({ success: false, error: 'no title block' })),
      });

      const execution = await executor.execute(makeState(), makeTask({ id: 't', method: 'createSheet' }));
      expect(execution.result).toEqual({ success: false, error: 'no title block' });
      expect(execution.outputs).toEqual({});
    });

    it('should report Unknown error when the failure carries no message', async () => {
      const executor = new TaskExecutor({
        operations: registryWith('createSheet', () => ({ success: false })),
      });

      const execution = await executor.execute(makeState(), makeTask({ id: 't', method: 'createSheet' }));
      expect(execution.result).toEqual({ success: false, error: 'Unknown error' });
    });

    it('should fail for an unregistered method', async () => {
      const executor = new TaskExecutor({ operations: new OperationRegistry() });

      const execution = await executor.execute(makeState(), makeTask({ id: 't', method: 'frobnicate' }));
      expect(execution.result).toEqual({
        success: false,
        error: "Method 'frobnicate' not implemented in workflow routing",
      });
    });

    it('should turn a thrown error into a failure', async () => {
      const executor = new TaskExecutor({
        operations: registryWith('createSheet', () => {
          throw new Error('transaction rolled back');
        }),
      });

      const execution = await executor.execute(makeState(), makeTask({ id: 't', method: 'createSheet' }));
      expect(execution.result).toEqual({ success: false, error: 'transaction rolled back' });
    });

    it('should honor the configured context fields', async () => {
      const handler = vi.fn((): OperationResult => ({ success: true, roomId: 5, sheetId: 1 }));
      const executor = new TaskExecutor({
        operations: registryWith('createRoom', handler),
        contextFields: ['roomId'],
      });

      const execution = await executor.execute(
        makeState({ context: { lastRoomId: 4, lastSheetId: 9 } }),
        makeTask({ id: 't', method: 'createRoom' })
      );

      expect(handler).toHaveBeenCalledWith({ roomId: 4 }, { workflowId: 'wf-1', taskId: 't' });
      expect(execution.outputs).toEqual({ lastRoomId: 5 });
    });

    it('should not mutate the workflow state', async () => {
      const executor = new TaskExecutor({
        operations: registryWith('createSheet', () => ({ success: true, sheetId: 3 })),
      });
      const state = makeState();

      await executor.execute(state, makeTask({ id: 't', method: 'createSheet' }));

      expect(state.completedTasks).toEqual([]);
      expect(state.context).toEqual({ projectType: 'General', buildingCode: 'IBC_2021', customParameters: {} });
      expect(state.cursor).toEqual({ phaseIndex: 0, taskIndex: 0 });
    });
  });
});

describe('recordTaskOutcome', () => {
  it('should fold a success into the state', () => {
    const state = makeState();
    const summary = emptySummary();
    const task = makeTask({ id: 't1', description: 'Create sheet', method: 'createSheet' });
    const decision = { task: 't1', decision: 'd', reason: 'r', timestamp: new Date() };

    recordTaskOutcome(
      state,
      'Sheets',
      task,
      {
        result: { success: true, decision },
        outputs: { lastSheetId: 7 },
        dispatchedParameters: {},
        startedAt: new Date('2026-01-01T00:00:01.000Z'),
        durationMs: 15,
      },
      summary
    );

    expect(state.completedTasks).toEqual(['Create sheet']);
    expect(state.decisions).toEqual([decision]);
    expect(state.context['lastSheetId']).toBe(7);
    expect(summary).toEqual({ tasksCompleted: 1, tasksFailed: 0, decisionsRecorded: 1 });
    expect(state.cursor).toEqual({ phaseIndex: 0, taskIndex: 1 });
    expect(state.history).toEqual([
      {
        phase: 'Sheets',
        taskId: 't1',
        description: 'Create sheet',
        method: 'createSheet',
        success: true,
        error: null,
        startedAt: new Date('2026-01-01T00:00:01.000Z'),
        durationMs: 15,
      },
    ]);
  });

  it('should fold a failure into the state', () => {
    const state = makeState({ cursor: { phaseIndex: 1, taskIndex: 2 } });
    const summary = emptySummary();
    const task = makeTask({ id: 't4', description: 'Place view', method: 'placeViewOnSheet' });

    recordTaskOutcome(
      state,
      'Sheets',
      task,
      {
        result: { success: false, error: 'view already placed' },
        outputs: {},
        dispatchedParameters: {},
        startedAt: new Date(),
        durationMs: 3,
      },
      summary
    );

    expect(state.completedTasks).toEqual([]);
    expect(state.failedTasks).toEqual(['Place view: view already placed']);
    expect(summary).toEqual({ tasksCompleted: 0, tasksFailed: 1, decisionsRecorded: 0 });
    expect(state.history[0]).toMatchObject({ success: false, error: 'view already placed' });
    expect(state.cursor).toEqual({ phaseIndex: 1, taskIndex: 3 });
  });

  it('should record custom tasks with no method', () => {
    const state = makeState();
    recordTaskOutcome(
      state,
      'Setup',
      makeTask({ id: 'c1', description: 'Choose title block', method: 'custom' }),
      { result: { success: true, decision: null }, outputs: {}, dispatchedParameters: null, startedAt: new Date(), durationMs: 0 },
      emptySummary()
    );

    expect(state.history[0]?.method).toBeNull();
  });
});
