import { Command } from 'commander';
import { z } from 'zod';
import { getConfig } from '../../config/index.js';
import { createCliOperationRegistry } from '../operations.js';
import { createCoordinator } from '../../workflow/index.js';
import type { CreateWorkflowRequest } from '../../types/index.js';
import {
  print,
  printError,
  formatError,
  formatJson,
  formatRunOutcome,
} from '../formatter.js';
import { collect, parseKeyValuePairs, reportOptionErrors } from '../options.js';

const runOptionsSchema = z.object({
  projectType: z.string().min(1).optional(),
  buildingCode: z.string().min(1).optional(),
  param: z.array(z.string()).default([]),
  operations: z.array(z.string().min(1)).default([]),
  dryRun: z.boolean().default(false),
  dir: z.string().min(1).optional(),
  json: z.boolean().default(false),
});

/**
 * Create the run command.
 */
export function createRunCommand(): Command {
  const command = new Command('run')
    .description('Run a workflow to completion in this process')
    .argument('<workflowType>', 'Workflow type, e.g. CD_Set')
    .option('-t, --project-type <type>', 'Project type (default: General)')
    .option('-b, --building-code <code>', 'Building code (default: IBC_2021)')
    .option('-p, --param <key=value>', 'Custom parameter (repeatable)', collect, [])
    .option('-o, --operations <module>', 'Operations module to load (repeatable)', collect, [])
    .option('--dry-run', 'Register the simulated document operations', false)
    .option('-d, --dir <dir>', 'Templates directory (defaults to CADFLOW_TEMPLATES_DIR)')
    .option('--json', 'Output as JSON', false)
    .action(async (workflowType: string, options: Record<string, unknown>) => {
      try {
        await executeRun(workflowType, options);
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });

  return command;
}

async function executeRun(workflowType: string, rawOptions: Record<string, unknown>): Promise<void> {
  const optionsResult = runOptionsSchema.safeParse(rawOptions);
  if (!optionsResult.success) {
    reportOptionErrors(optionsResult.error);
    return;
  }

  const options = optionsResult.data;
  const config = getConfig();

  const operations = await createCliOperationRegistry(options);

  const coordinator = createCoordinator(
    { ...config, templatesDir: options.dir ?? config.templatesDir },
    operations
  );

  const request: CreateWorkflowRequest = {
    workflowType,
    ...(options.projectType !== undefined && { projectType: options.projectType }),
    ...(options.buildingCode !== undefined && { buildingCode: options.buildingCode }),
    ...(options.param.length > 0 && { customParameters: parseKeyValuePairs(options.param) }),
  };

  const outcome = await coordinator.createAndRun(request);

  if (options.json) {
    print(formatJson(outcome));
  } else {
    print(formatRunOutcome(outcome));
  }

  if (outcome.tasksFailed > 0) {
    process.exitCode = 1;
  }
}
