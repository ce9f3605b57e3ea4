/**
 * Workflow Template Store Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { WorkflowTemplateStore, parseTemplate } from '../src/templates/store.js';
import {
  TemplateNotFoundError,
  TemplateParseError,
  TemplateValidationError,
} from '../src/templates/errors.js';
import { createTempDir, removeTempDir, writeTemplate } from './support/fixtures.js';

const GENERIC = {
  workflowType: 'CD_Set',
  name: 'Generic CD Set',
  phases: [{ name: 'Sheets', tasks: [{ id: 's1', method: 'createSheet' }] }],
};

const RESIDENTIAL = {
  workflowType: 'CD_Set',
  name: 'Residential CD Set',
  projectTypes: ['Residential'],
  phases: [],
};

describe('parseTemplate', () => {
  it('should apply task defaults', () => {
    const template = parseTemplate(
      JSON.stringify({ phases: [{ name: 'P', tasks: [{}, { id: 't2', description: 'Second' }] }] }),
      'inline.json'
    );

    expect(template.projectTypes).toEqual([]);
    expect(template.phases[0]?.tasks).toEqual([
      { id: 'unknown', description: 'unknown', method: '', parameters: {}, autonomousDecisionHint: null },
      { id: 't2', description: 'Second', method: '', parameters: {}, autonomousDecisionHint: null },
    ]);
  });

  it('should read the autonomous decision hint', () => {
    const template = parseTemplate(
      'phases:\n  - name: P\n    tasks:\n      - id: t1\n        autonomous_decision: pick default title block\n',
      'inline.yaml'
    );

    expect(template.phases[0]?.tasks[0]?.autonomousDecisionHint).toBe('pick default title block');
  });

  it('should default a phase without tasks to an empty list', () => {
    const template = parseTemplate('{"phases":[{"name":"Empty"}]}', 'inline.json');
    expect(template.phases).toEqual([{ name: 'Empty', tasks: [] }]);
  });

  it('should keep unknown top-level keys', () => {
    const template = parseTemplate('{"phases":[],"owner":"studio"}', 'inline.json');
    expect(template['owner']).toBe('studio');
  });

  it('should throw a parse error for malformed documents', () => {
    expect(() => parseTemplate('{"phases": [', 'broken.json')).toThrow(TemplateParseError);
  });

  it('should throw a validation error when phases are missing', () => {
    try {
      parseTemplate('{"name":"No phases"}', 'invalid.json');
      expect.fail('expected a validation error');
    } catch (error) {
      expect(error).toBeInstanceOf(TemplateValidationError);
      if (error instanceof TemplateValidationError) {
        expect(error.validationErrors).toEqual(['phases: Required']);
        expect(error.filePath).toBe('invalid.json');
      }
    }
  });
});

describe('WorkflowTemplateStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  describe('load', () => {
    it('should prefer the project-specific template', async () => {
      await writeTemplate(dir, 'CD_Set.json', GENERIC);
      await writeTemplate(dir, 'CD_Set_Residential.json', RESIDENTIAL);
      const store = new WorkflowTemplateStore({ templatesDir: dir });

      const template = await store.load('CD_Set', 'Residential');
      expect(template.name).toBe('Residential CD Set');
    });

    it('should fall back to the generic template', async () => {
      await writeTemplate(dir, 'CD_Set.json', GENERIC);
      const store = new WorkflowTemplateStore({ templatesDir: dir });

      const template = await store.load('CD_Set', 'Healthcare');
      expect(template.name).toBe('Generic CD Set');
    });

    it('should load YAML templates', async () => {
      await writeTemplate(
        dir,
        'DD_Package.yaml',
        'name: DD Package\nphases:\n  - name: Audit\n    tasks:\n      - id: rooms\n        method: getRooms\n'
      );
      const store = new WorkflowTemplateStore({ templatesDir: dir });

      const template = await store.load('DD_Package', 'General');
      expect(template.name).toBe('DD Package');
      expect(template.phases[0]?.tasks[0]?.method).toBe('getRooms');
    });

    it('should throw TemplateNotFoundError listing every path tried', async () => {
      const store = new WorkflowTemplateStore({ templatesDir: dir });

      try {
        await store.load('Unknown', 'General');
        expect.fail('expected TemplateNotFoundError');
      } catch (error) {
        expect(error).toBeInstanceOf(TemplateNotFoundError);
        if (error instanceof TemplateNotFoundError) {
          expect(error.workflowType).toBe('Unknown');
          expect(error.searchPaths).toEqual([
            path.join(store.templatesDir, 'Unknown_General.json'),
            path.join(store.templatesDir, 'Unknown_General.yaml'),
            path.join(store.templatesDir, 'Unknown_General.yml'),
            path.join(store.templatesDir, 'Unknown.json'),
            path.join(store.templatesDir, 'Unknown.yaml'),
            path.join(store.templatesDir, 'Unknown.yml'),
          ]);
        }
      }
    });

    it('should not resolve keys that leave the templates directory', async () => {
      await writeTemplate(dir, 'CD_Set.json', GENERIC);
      const store = new WorkflowTemplateStore({ templatesDir: path.join(dir, 'nested') });
      await fs.mkdir(store.templatesDir);

      await expect(store.load('../CD_Set', 'General')).rejects.toThrow(TemplateNotFoundError);
    });

    it('should surface a malformed template instead of falling back', async () => {
      await writeTemplate(dir, 'CD_Set.json', GENERIC);
      await writeTemplate(dir, 'CD_Set_General.json', '{"phases": [');
      const store = new WorkflowTemplateStore({ templatesDir: dir });

      await expect(store.load('CD_Set', 'General')).rejects.toThrow(TemplateParseError);
    });

    it('should serve cached templates when caching is enabled', async () => {
      const filePath = await writeTemplate(dir, 'CD_Set.json', GENERIC);
      const store = new WorkflowTemplateStore({ templatesDir: dir, cache: true });

      await store.load('CD_Set', 'General');
      await writeTemplate(dir, 'CD_Set.json', { ...GENERIC, name: 'Edited' });
      expect((await store.load('CD_Set', 'General')).name).toBe('Generic CD Set');

      store.clearCache();
      expect((await store.load('CD_Set', 'General')).name).toBe('Edited');
      expect(filePath).toBe(path.join(dir, 'CD_Set.json'));
    });

    it('should reread templates when caching is disabled', async () => {
      await writeTemplate(dir, 'CD_Set.json', GENERIC);
      const store = new WorkflowTemplateStore({ templatesDir: dir });

      await store.load('CD_Set', 'General');
      await writeTemplate(dir, 'CD_Set.json', { ...GENERIC, name: 'Edited' });
      expect((await store.load('CD_Set', 'General')).name).toBe('Edited');
    });
  });

  describe('list', () => {
    it('should list templates sorted by file name and skip unreadable ones', async () => {
      await writeTemplate(dir, 'DD_Package.json', { name: 'DD Package', phases: [] });
      await writeTemplate(dir, 'CD_Set.json', { ...GENERIC, estimatedTime: '45 minutes' });
      await writeTemplate(dir, 'broken.yaml', 'phases: [');
      await writeTemplate(dir, 'notes.txt', 'ignored');

      const store = new WorkflowTemplateStore({ templatesDir: dir });
      const templates = await store.list();

      expect(templates).toEqual([
        {
          workflowType: 'CD_Set',
          name: 'Generic CD Set',
          description: null,
          projectTypes: [],
          phases: 1,
          estimatedTime: '45 minutes',
          file: 'CD_Set.json',
        },
        {
          workflowType: 'DD_Package',
          name: 'DD Package',
          description: null,
          projectTypes: [],
          phases: 0,
          estimatedTime: null,
          file: 'DD_Package.json',
        },
      ]);
    });

    it('should return an empty list when the directory does not exist', async () => {
      const store = new WorkflowTemplateStore({ templatesDir: path.join(dir, 'missing') });
      expect(await store.list()).toEqual([]);
    });
  });
});
