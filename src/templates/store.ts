/**
 * Workflow Template Store
 *
 * Resolves a (workflowType, projectType) pair to a template document in the
 * templates directory. `<workflowType>_<projectType>` is tried first, then
 * `<workflowType>` alone. Documents may be JSON or YAML.
 *
 * @module templates/store
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as YAML from 'yaml';
import {
  workflowTemplateSchema,
  type TemplateInfo,
  type WorkflowTemplate,
} from '../types/index.js';
import {
  TemplateNotFoundError,
  TemplateParseError,
  TemplateValidationError,
} from './errors.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('template-store');

export const TEMPLATE_EXTENSIONS = ['.json', '.yaml', '.yml'] as const;

export interface TemplateStoreOptions {
  templatesDir: string;
  /** Keep parsed templates in memory, keyed by file path */
  cache?: boolean;
}

/**
 * Parse and validate a template document.
 *
 * @throws TemplateParseError if the document is not valid JSON/YAML
 * @throws TemplateValidationError if it does not match the template schema
 */
export function parseTemplate(content: string, filePath: string): WorkflowTemplate {
  let parsed: unknown;
  try {
    parsed = YAML.parse(content);
  } catch (err) {
    throw new TemplateParseError(filePath, err instanceof Error ? err : new Error(String(err)));
  }

  const result = workflowTemplateSchema.safeParse(parsed);
  if (!result.success) {
    throw new TemplateValidationError(filePath, result.error);
  }
  return result.data;
}

/**
 * Read, parse and validate a template file.
 */
export async function loadTemplateFile(filePath: string): Promise<WorkflowTemplate> {
  const content = await fs.readFile(filePath, 'utf-8');
  return parseTemplate(content, filePath);
}

function isTemplateFile(fileName: string): boolean {
  return TEMPLATE_EXTENSIONS.some((ext) => fileName.endsWith(ext));
}

function stripExtension(fileName: string): string {
  return fileName.slice(0, fileName.length - path.extname(fileName).length);
}

/**
 * A template key is used as a file name; anything that could leave the
 * templates directory is rejected.
 */
function isSafeKey(key: string): boolean {
  return key.length > 0 && !key.includes('/') && !key.includes('\\') && !key.includes('..');
}

export class WorkflowTemplateStore {
  readonly templatesDir: string;
  private readonly cacheEnabled: boolean;
  private readonly cache: Map<string, WorkflowTemplate> = new Map();

  constructor(options: TemplateStoreOptions) {
    this.templatesDir = path.resolve(options.templatesDir);
    this.cacheEnabled = options.cache ?? false;
  }

  /**
   * Resolve a template, falling back from the project-specific key to the
   * generic one.
   *
   * @throws TemplateNotFoundError if neither key resolves to a file
   * @throws TemplateParseError if the resolved file is malformed
   * @throws TemplateValidationError if the resolved file has the wrong shape
   */
  async load(workflowType: string, projectType: string): Promise<WorkflowTemplate> {
    const keys = [`${workflowType}_${projectType}`, workflowType].filter(isSafeKey);
    const searchPaths: string[] = [];

    for (const key of keys) {
      for (const ext of TEMPLATE_EXTENSIONS) {
        const filePath = path.join(this.templatesDir, `${key}${ext}`);
        searchPaths.push(filePath);

        const template = await this.readTemplate(filePath);
        if (template) {
          logger.debug({ workflowType, projectType, filePath }, 'Template resolved');
          return template;
        }
      }
    }

    logger.warn({ workflowType, projectType }, 'Workflow template not found');
    throw new TemplateNotFoundError(workflowType, searchPaths);
  }

  /**
   * Lists every template in the directory. Files that fail to parse are
   * skipped.
   */
  async list(): Promise<TemplateInfo[]> {
    let fileNames: string[];
    try {
      const entries = await fs.readdir(this.templatesDir, { withFileTypes: true });
      fileNames = entries
        .filter((entry) => entry.isFile() && isTemplateFile(entry.name))
        .map((entry) => entry.name)
        .sort();
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
        logger.debug({ dir: this.templatesDir }, 'Templates directory does not exist');
        return [];
      }
      throw err;
    }

    const templates: TemplateInfo[] = [];
    for (const fileName of fileNames) {
      const filePath = path.join(this.templatesDir, fileName);
      try {
        const template = await loadTemplateFile(filePath);
        templates.push({
          workflowType: template.workflowType ?? stripExtension(fileName),
          name: template.name ?? null,
          description: template.description ?? null,
          projectTypes: template.projectTypes,
          phases: template.phases.length,
          estimatedTime: template.estimatedTime ?? null,
          file: fileName,
        });
      } catch (err) {
        logger.warn({ filePath, err }, 'Skipping unreadable workflow template');
      }
    }

    return templates;
  }

  /**
   * Drop cached templates
   */
  clearCache(): void {
    this.cache.clear();
  }

  /**
   * Returns null when the file does not exist.
   */
  private async readTemplate(filePath: string): Promise<WorkflowTemplate | null> {
    const cached = this.cache.get(filePath);
    if (cached) {
      return cached;
    }

    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (err) {
      const code = (err as NodeJS.ErrnoException).code;
      if (code === 'ENOENT' || code === 'EISDIR') {
        return null;
      }
      throw err;
    }

    const template = parseTemplate(content, filePath);
    if (this.cacheEnabled) {
      this.cache.set(filePath, template);
    }
    return template;
  }
}
