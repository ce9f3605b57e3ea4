import { Command } from 'commander';
import { z } from 'zod';
import { loadTemplateFile } from '../../templates/store.js';
import { TemplateParseError, TemplateValidationError } from '../../templates/errors.js';
import { createCliOperationRegistry } from '../operations.js';
import { isCustomTask } from '../../workflow/task-executor.js';
import type { WorkflowTemplate } from '../../types/index.js';
import {
  print,
  printError,
  formatError,
  formatSuccess,
  formatTemplateOutline,
  formatValidationErrors,
  formatWarning,
} from '../formatter.js';
import { collect, reportOptionErrors } from '../options.js';

const validateOptionsSchema = z.object({
  operations: z.array(z.string().min(1)).default([]),
  dryRun: z.boolean().default(false),
});

/**
 * Create the validate command.
 */
export function createValidateCommand(): Command {
  const command = new Command('validate')
    .description('Validate a workflow template file')
    .argument('<file>', 'Template file (.json, .yaml or .yml)')
    .option(
      '-o, --operations <module>',
      'Operations module; methods it does not register are reported (repeatable)',
      collect,
      []
    )
    .option('--dry-run', 'Check methods against the simulated document operations', false)
    .action(async (file: string, options: Record<string, unknown>) => {
      try {
        await executeValidate(file, options);
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });

  return command;
}

/**
 * Load the template, printing parse and validation failures.
 * Returns null when the file is not a valid template.
 */
async function readTemplate(file: string): Promise<WorkflowTemplate | null> {
  try {
    return await loadTemplateFile(file);
  } catch (error) {
    if (error instanceof TemplateValidationError) {
      printError(
        formatValidationErrors(
          error.validationErrors.map((message) => ({ path: '', message }))
        )
      );
      return null;
    }
    if (error instanceof TemplateParseError) {
      printError(formatError(error.message));
      return null;
    }
    throw error;
  }
}

async function executeValidate(file: string, rawOptions: Record<string, unknown>): Promise<void> {
  const optionsResult = validateOptionsSchema.safeParse(rawOptions);
  if (!optionsResult.success) {
    reportOptionErrors(optionsResult.error);
    return;
  }
  const options = optionsResult.data;

  const template = await readTemplate(file);
  if (!template) {
    process.exitCode = 1;
    return;
  }

  const taskCount = template.phases.reduce((sum, phase) => sum + phase.tasks.length, 0);
  print(
    formatSuccess(
      `${template.name ?? file} is valid (${template.phases.length} phases, ${taskCount} tasks)`
    )
  );
  print(formatTemplateOutline(template));

  if (options.operations.length === 0 && !options.dryRun) {
    return;
  }

  const registry = await createCliOperationRegistry(options);

  const unknownMethods = new Set<string>();
  for (const phase of template.phases) {
    for (const task of phase.tasks) {
      if (!isCustomTask(task) && !registry.has(task.method)) {
        unknownMethods.add(task.method);
      }
    }
  }

  for (const method of unknownMethods) {
    print(formatWarning(`Method '${method}' is not registered by the given operations modules`));
  }
}
