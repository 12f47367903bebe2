/**
 * CLI Commands: projects, device-pools, devices, account
 */

import type { DeviceFarmService } from '../../services/device-farm/index.js';

export async function executeProjectsCommand(service: DeviceFarmService): Promise<void> {
  const projects = await service.listProjects();
  if (projects.length === 0) {
    console.log('No projects found.');
    return;
  }
  for (const project of projects) {
    console.log(`${project.name ?? ''}\t${project.arn ?? ''}`);
  }
}

export async function executeDevicePoolsCommand(
  service: DeviceFarmService,
  args: string[]
): Promise<void> {
  const projectName = args[0];
  if (!projectName) {
    throw new Error('Usage: device-farm device-pools <project>');
  }
  for (const pool of await service.listDevicePools(projectName)) {
    console.log(`${pool.name ?? ''}\t${pool.type ?? ''}\t${pool.arn ?? ''}`);
  }
}

export async function executeDevicesCommand(service: DeviceFarmService, args: string[]): Promise<void> {
  const projectName = args[0];
  if (!projectName) {
    throw new Error('Usage: device-farm devices <project>');
  }
  for (const device of await service.listDevices(projectName)) {
    console.log(`${device.name ?? ''}\t${device.platform ?? ''}\t${device.os ?? ''}\t${device.arn ?? ''}`);
  }
}

export async function executeAccountCommand(service: DeviceFarmService): Promise<void> {
  const settings = await service.getAccountSettings();
  if (!settings) {
    console.log('No account settings found.');
    return;
  }
  console.log(`Account:            ${settings.awsAccountNumber ?? 'unknown'}`);
  console.log(`Unmetered Android:  ${settings.unmeteredDevices?.ANDROID ?? 0}`);
  console.log(`Unmetered iOS:      ${settings.unmeteredDevices?.IOS ?? 0}`);
  console.log(`Max job timeout:    ${settings.maxJobTimeoutMinutes ?? 'unknown'} minutes`);
}
