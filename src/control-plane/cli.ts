import { Command } from 'commander';
import { createTemplatesCommand } from './commands/templates.js';
import { createValidateCommand } from './commands/validate.js';
import { createRunCommand } from './commands/run.js';
import { createServeCommand } from './commands/serve.js';

/**
 * Package version - will be updated during build
 */
const VERSION = '0.1.0';

/**
 * Create and configure the CLI program.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('cadflow')
    .description('cadflow - Template-driven workflow engine for CAD deliverables')
    .version(VERSION, '-v, --version', 'Output the current version');

  program.addCommand(createTemplatesCommand());
  program.addCommand(createValidateCommand());
  program.addCommand(createRunCommand());
  program.addCommand(createServeCommand());

  program.exitOverride();

  return program;
}

/**
 * Run the CLI program.
 */
export async function runCli(args: string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(args);
  } catch (error) {
    // Commander throws on --help and --version
    if (
      error instanceof Error &&
      'code' in error &&
      (error.code === 'commander.helpDisplayed' ||
        error.code === 'commander.version')
    ) {
      return;
    }

    throw error;
  }
}

export { createTemplatesCommand } from './commands/templates.js';
export { createValidateCommand } from './commands/validate.js';
export { createRunCommand } from './commands/run.js';
export { createServeCommand } from './commands/serve.js';
