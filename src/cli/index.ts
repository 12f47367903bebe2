#!/usr/bin/env node
/**
 * CLI entry point for Device Farm Runner
 */

import { config } from '../config/env.js';
import { createModuleLogger } from '../utils/logger.js';
import { createServiceFromEnv } from './context.js';
import {
  executeAccountCommand,
  executeDevicePoolsCommand,
  executeDevicesCommand,
  executeProjectsCommand,
} from './commands/discover.js';
import { displayRunHelp, executeRunCommand } from './commands/run.js';
import { executeArtifactsCommand, executeStatusCommand } from './commands/results.js';

const logger = createModuleLogger('cli');

const args = process.argv.slice(2);

async function main(): Promise<void> {
  const [command, ...rest] = args;

  if (!command || command === '--help' || command === '-h') {
    displayMainHelp();
    return;
  }

  if (command === 'run' && (rest.includes('--help') || rest.includes('-h'))) {
    displayRunHelp();
    return;
  }

  const service = await createServiceFromEnv(config);

  switch (command) {
    case 'projects':
      await executeProjectsCommand(service);
      break;
    case 'device-pools':
      await executeDevicePoolsCommand(service, rest);
      break;
    case 'devices':
      await executeDevicesCommand(service, rest);
      break;
    case 'account':
      await executeAccountCommand(service);
      break;
    case 'run':
      await executeRunCommand(service, rest);
      break;
    case 'status':
      await executeStatusCommand(service, rest);
      break;
    case 'artifacts':
      await executeArtifactsCommand(service, rest);
      break;
    default:
      throw new Error(`Unknown command '${command}'. Run 'device-farm --help' for usage.`);
  }
}

/**
 * Display main CLI help
 */
function displayMainHelp(): void {
  console.log(`
Device Farm Runner
==================

Upload apps and tests to AWS Device Farm, schedule runs and collect results.

Usage:
  device-farm <command> [options]

Commands:
  projects                       List projects
  device-pools <project>         List a project's device pools
  devices <project>              List devices available to a project
  account                        Show account settings and unmetered devices
  run [options]                  Upload artifacts and schedule a run
  status <run-arn>               Show a run's status and counters
  artifacts <run-arn> <dir>      Download a run's artifacts into <dir>

Options:
  -h, --help                     Show this help message

Credentials:
  DEVICE_FARM_ROLE_ARN           Role to assume (takes precedence)
  AWS_ACCESS_KEY_ID              Static credentials
  AWS_SECRET_ACCESS_KEY
  AWS_SESSION_TOKEN

For more information on a specific command, use:
  device-farm run --help
`);
}

main().catch((error: unknown) => {
  const err = error instanceof Error ? error : new Error(String(error));
  logger.error(err, 'Command failed');
  console.error(`Error: ${err.message}`);
  process.exit(1);
});
