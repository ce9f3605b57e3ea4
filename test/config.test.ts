import { describe, it, expect, afterEach } from 'vitest';
import { loadConfig, getConfig, resetConfig } from '../src/config/index.js';

describe('loadConfig', () => {
  afterEach(() => {
    resetConfig();
  });

  it('should apply defaults', () => {
    expect(loadConfig({})).toEqual({
      templatesDir: './workflows',
      cacheTemplates: false,
      maxRetainedWorkflows: 100,
      taskTimeoutMs: 0,
      contextFields: ['scheduleId', 'sheetId', 'viewId'],
      port: 3001,
      host: '0.0.0.0',
    });
  });

  it('should read CADFLOW_ variables', () => {
    const config = loadConfig({
      CADFLOW_TEMPLATES_DIR: '/srv/templates',
      CADFLOW_CACHE_TEMPLATES: 'true',
      CADFLOW_MAX_RETAINED_WORKFLOWS: '25',
      CADFLOW_TASK_TIMEOUT_MS: '30000',
      CADFLOW_CONTEXT_FIELDS: 'sheetId, roomId ,',
      CADFLOW_PORT: '8080',
      CADFLOW_HOST: '127.0.0.1',
      CADFLOW_API_KEY: 'test-secret',
    });

    expect(config).toEqual({
      templatesDir: '/srv/templates',
      cacheTemplates: true,
      maxRetainedWorkflows: 25,
      taskTimeoutMs: 30000,
      contextFields: ['sheetId', 'roomId'],
      port: 8080,
      host: '127.0.0.1',
      apiKey: 'test-secret',
    });
  });

  it('should not treat "false" or "0" as enabled', () => {
    expect(loadConfig({ CADFLOW_CACHE_TEMPLATES: 'false' }).cacheTemplates).toBe(false);
    expect(loadConfig({ CADFLOW_CACHE_TEMPLATES: '0' }).cacheTemplates).toBe(false);
    expect(loadConfig({ CADFLOW_CACHE_TEMPLATES: 'yes' }).cacheTemplates).toBe(true);
  });

  it('should reject invalid values', () => {
    expect(() => loadConfig({ CADFLOW_MAX_RETAINED_WORKFLOWS: '0' })).toThrow(
      'Configuration validation failed'
    );
    expect(() => loadConfig({ CADFLOW_PORT: 'not-a-port' })).toThrow('Configuration validation failed');
    expect(() => loadConfig({ CADFLOW_CONTEXT_FIELDS: 'sheet-id' })).toThrow(
      'Configuration validation failed'
    );
  });

  it('should cache the singleton until reset', () => {
    const first = getConfig();
    expect(getConfig()).toBe(first);
    resetConfig();
    expect(getConfig()).not.toBe(first);
  });
});
