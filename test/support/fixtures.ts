/**
 * Shared builders for workflow tests
 */

import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  WorkflowStatus,
  taskDefinitionSchema,
  type TaskDefinition,
  type WorkflowState,
} from '../../src/types/index.js';

export function makeState(overrides: Partial<WorkflowState> = {}): WorkflowState {
  return {
    id: 'wf-1',
    workflowType: 'CD_Set',
    projectType: 'General',
    buildingCode: 'IBC_2021',
    templateName: 'CD_Set',
    startTime: new Date('2026-01-01T00:00:00.000Z'),
    completedAt: null,
    currentPhase: null,
    completedTasks: [],
    failedTasks: [],
    decisions: [],
    history: [],
    context: { projectType: 'General', buildingCode: 'IBC_2021', customParameters: {} },
    isPaused: false,
    status: WorkflowStatus.RUNNING,
    cursor: { phaseIndex: 0, taskIndex: 0 },
    phaseSummaries: {},
    ...overrides,
  };
}

/**
 * Task definition as the template schema would produce it
 */
export function makeTask(raw: Record<string, unknown>): TaskDefinition {
  return taskDefinitionSchema.parse(raw);
}

export async function createTempDir(prefix = 'cadflow-test-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export async function writeTemplate(dir: string, fileName: string, document: unknown): Promise<string> {
  const filePath = path.join(dir, fileName);
  const content = typeof document === 'string' ? document : JSON.stringify(document, null, 2);
  await fs.writeFile(filePath, content, 'utf-8');
  return filePath;
}

/**
 * A promise plus the function that settles it
 */
export function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}
