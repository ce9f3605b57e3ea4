/**
 * Dry-run catalog and bundled template tests
 */

import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'node:url';
import { createDryRunModule, loadDryRunCatalog } from '../src/operations/dry-run.js';
import { OperationRegistry } from '../src/operations/registry.js';
import { WorkflowTemplateStore } from '../src/templates/store.js';
import { WorkflowCoordinator } from '../src/workflow/coordinator.js';
import { WorkflowStatus } from '../src/types/index.js';

const WORKFLOWS_DIR = fileURLToPath(new URL('../workflows', import.meta.url));
const context = { workflowId: 'wf-1', taskId: 't1' };

async function dryRunRegistry(): Promise<OperationRegistry> {
  const registry = new OperationRegistry();
  registry.registerModule(createDryRunModule(await loadDryRunCatalog()));
  return registry;
}

describe('dry-run catalog', () => {
  it('should register the standard operations with their aliases', async () => {
    const registry = await dryRunRegistry();

    expect(registry.size).toBe(27);
    expect(registry.has('getAllSheets')).toBe(true);
    expect(registry.has('getallschedules')).toBe(true);
    expect(registry.has('getAllFamilies')).toBe(true);
  });

  it('should tag rooms through the category preset', async () => {
    const registry = await dryRunRegistry();

    const result = await registry.invoke('tagAllRooms', { category: 'Doors', viewId: 3 }, context);

    expect(result).toEqual({
      ok: true,
      value: {
        success: true,
        dryRun: true,
        operation: 'tagAllRooms',
        parameters: { category: 'Rooms', viewId: 3 },
      },
    });
  });

  it('should number produced ids from 1', async () => {
    const registry = await dryRunRegistry();

    const view = await registry.invoke('createFloorPlan', {}, context);
    const sheet = await registry.invoke('createSheet', {}, context);

    expect(view.ok && view.value['viewId']).toBe(1);
    expect(sheet.ok && sheet.value['sheetId']).toBe(2);
  });
});

describe('bundled templates', () => {
  it('should all parse', async () => {
    const store = new WorkflowTemplateStore({ templatesDir: WORKFLOWS_DIR });

    const templates = await store.list();

    expect(templates.map((t) => [t.file, t.workflowType])).toEqual([
      ['CD_Set.json', 'CD_Set'],
      ['CD_Set_Residential.yaml', 'CD_Set'],
      ['DD_Package.yaml', 'DD_Package'],
    ]);
  });

  it('should run the construction document set against the dry-run catalog', async () => {
    const coordinator = new WorkflowCoordinator({
      operations: await dryRunRegistry(),
      templates: new WorkflowTemplateStore({ templatesDir: WORKFLOWS_DIR }),
    });

    const outcome = await coordinator.createAndRun({ workflowType: 'CD_Set' });
    const status = coordinator.getStatus(outcome.workflowId);

    expect(outcome.status).toBe(WorkflowStatus.COMPLETED);
    expect(outcome.tasksCompleted).toBe(10);
    expect(outcome.decisionsMade).toBe(2);
    expect(status.templateName).toBe('Construction Document Set');
    expect(status.context).toMatchObject({ lastViewId: 1, lastSheetId: 2, lastScheduleId: 4 });
  });

  it('should pick the residential variant for residential projects', async () => {
    const coordinator = new WorkflowCoordinator({
      operations: await dryRunRegistry(),
      templates: new WorkflowTemplateStore({ templatesDir: WORKFLOWS_DIR }),
    });

    const outcome = await coordinator.createAndRun({ workflowType: 'CD_Set', projectType: 'Residential' });

    expect(coordinator.getStatus(outcome.workflowId).templateName).toBe(
      'Construction Document Set (Residential)'
    );
    expect(outcome.tasksCompleted).toBe(5);
  });
});
