import { Command } from 'commander';
import { z } from 'zod';
import { getConfig } from '../../config/index.js';
import { WorkflowTemplateStore } from '../../templates/store.js';
import {
  print,
  printError,
  formatError,
  formatJson,
  formatTemplateList,
} from '../formatter.js';
import { reportOptionErrors } from '../options.js';

const templatesOptionsSchema = z.object({
  dir: z.string().min(1).optional(),
  json: z.boolean().default(false),
});

/**
 * Create the templates command.
 */
export function createTemplatesCommand(): Command {
  const command = new Command('templates')
    .description('List workflow templates in the templates directory')
    .option('-d, --dir <dir>', 'Templates directory (defaults to CADFLOW_TEMPLATES_DIR)')
    .option('--json', 'Output as JSON', false)
    .action(async (options: Record<string, unknown>) => {
      try {
        await executeTemplates(options);
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });

  return command;
}

async function executeTemplates(rawOptions: Record<string, unknown>): Promise<void> {
  const optionsResult = templatesOptionsSchema.safeParse(rawOptions);
  if (!optionsResult.success) {
    reportOptionErrors(optionsResult.error);
    return;
  }

  const options = optionsResult.data;
  const store = new WorkflowTemplateStore({
    templatesDir: options.dir ?? getConfig().templatesDir,
  });
  const templates = await store.list();

  if (options.json) {
    print(formatJson(templates));
  } else {
    print(formatTemplateList(templates));
  }
}
