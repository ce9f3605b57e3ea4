import { Command } from 'commander';
import { z } from 'zod';
import { getConfig } from '../../config/index.js';
import { createCliOperationRegistry } from '../operations.js';
import { createCoordinator } from '../../workflow/index.js';
import { startServer } from '../../server/index.js';
import {
  print,
  printError,
  formatError,
  bold,
  cyan,
} from '../formatter.js';
import { collect, reportOptionErrors } from '../options.js';

/**
 * Schema for serve command options. Port and host fall back to configuration.
 */
const serveOptionsSchema = z.object({
  port: z.coerce.number().int().min(1).max(65535).optional(),
  host: z.string().min(1).optional(),
  corsOrigin: z.string().optional(),
  operations: z.array(z.string().min(1)).default([]),
  dryRun: z.boolean().default(false),
});

type ServeOptions = z.infer<typeof serveOptionsSchema>;

/**
 * Create the serve command.
 */
export function createServeCommand(): Command {
  const command = new Command('serve')
    .description('Start the cadflow HTTP server')
    .option('-p, --port <port>', 'Port to listen on (defaults to CADFLOW_PORT or 3001)')
    .option('-H, --host <host>', 'Host to bind to (defaults to CADFLOW_HOST or 0.0.0.0)')
    .option('--cors-origin <origin>', 'CORS origin to allow (can specify multiple with comma)')
    .option('-o, --operations <module>', 'Operations module to load (repeatable)', collect, [])
    .option('--dry-run', 'Register the simulated document operations', false)
    .action(async (options: Record<string, unknown>) => {
      try {
        await executeServe(options);
      } catch (error) {
        printError(formatError(error instanceof Error ? error.message : String(error)));
        process.exitCode = 1;
      }
    });

  return command;
}

/**
 * Execute the serve command.
 */
async function executeServe(rawOptions: Record<string, unknown>): Promise<void> {
  const optionsResult = serveOptionsSchema.safeParse(rawOptions);
  if (!optionsResult.success) {
    reportOptionErrors(optionsResult.error);
    return;
  }

  const options: ServeOptions = optionsResult.data;
  const config = getConfig();
  const port = options.port ?? config.port;
  const host = options.host ?? config.host;

  const corsOrigins = options.corsOrigin
    ? options.corsOrigin.split(',').map((o) => o.trim())
    : ['*'];

  const operations = await createCliOperationRegistry(options);
  const coordinator = createCoordinator(config, operations);

  print(`Starting cadflow server...`);
  print('');
  print(`${bold('Port:')} ${cyan(String(port))}`);
  print(`${bold('Host:')} ${cyan(host)}`);
  print(`${bold('Templates:')} ${cyan(coordinator.templates.templatesDir)}`);
  print(`${bold('Operations:')} ${cyan(String(operations.size))}`);
  print(`${bold('CORS Origins:')} ${cyan(corsOrigins.join(', '))}`);
  print('');

  const server = await startServer({
    coordinator,
    port,
    host,
    corsOrigins,
    ...(config.apiKey !== undefined && { apiKey: config.apiKey }),
  });

  const shutdown = (): void => {
    print('');
    print('Shutting down server...');
    server.close().then(() => {
      print('Server stopped');
      process.exit(0);
    }).catch((err: unknown) => {
      printError(formatError(err instanceof Error ? err.message : String(err)));
      process.exit(1);
    });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  print(`Server is running at ${cyan(`http://${host}:${port}`)}`);
  print('');
  print('Available endpoints:');
  print(`  ${cyan('GET')}  /health                        - Health check`);
  print(`  ${cyan('GET')}  /health/ready                  - Readiness check`);
  print(`  ${cyan('GET')}  /api/v1/templates              - List templates`);
  print(`  ${cyan('GET')}  /api/v1/operations             - List operations`);
  print(`  ${cyan('POST')} /api/v1/workflows              - Create workflow`);
  print(`  ${cyan('GET')}  /api/v1/workflows/:id          - Workflow status`);
  print(`  ${cyan('POST')} /api/v1/workflows/:id/pause    - Pause workflow`);
  print(`  ${cyan('POST')} /api/v1/workflows/:id/resume   - Resume workflow`);
  print(`  ${cyan('POST')} /api/v1/workflows/:id/continue - Continue workflow`);
  print('');
  print('Press Ctrl+C to stop the server');
}
