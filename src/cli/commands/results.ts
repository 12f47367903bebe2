/**
 * CLI Commands: status, artifacts
 */

import type { DeviceFarmService } from '../../services/device-farm/index.js';

export async function executeStatusCommand(service: DeviceFarmService, args: string[]): Promise<void> {
  const runArn = args[0];
  if (!runArn) {
    throw new Error('Usage: device-farm status <run-arn>');
  }

  const run = await service.describeRun(runArn);
  console.log(`Run:     ${run.name ?? runArn}`);
  console.log(`Status:  ${run.status ?? 'UNKNOWN'}`);
  console.log(`Result:  ${run.result ?? 'PENDING'}`);

  const counters = run.counters;
  if (counters) {
    console.log(
      `Tests:   ${counters.passed ?? 0} passed, ${counters.failed ?? 0} failed, ` +
        `${counters.errored ?? 0} errored, ${counters.skipped ?? 0} skipped (${counters.total ?? 0} total)`
    );
  }
}

export async function executeArtifactsCommand(service: DeviceFarmService, args: string[]): Promise<void> {
  const [runArn, destination] = args;
  if (!runArn || !destination) {
    throw new Error('Usage: device-farm artifacts <run-arn> <destination>');
  }

  const collection = await service.getArtifacts(runArn, destination);
  for (const file of collection.artifacts) {
    console.log(file);
  }
  console.log(
    `\n${collection.artifacts.length} artifacts from ${collection.jobs.size} jobs, ` +
      `${collection.suites.size} suites and ${collection.tests.size} tests`
  );
}
