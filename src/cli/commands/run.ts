/**
 * CLI Command: run
 * Upload an app and its tests, then schedule a run
 */

import {
  DEFAULT_JOB_TIMEOUT_MINUTES,
  TEST_FRAMEWORK_TYPES,
  buildScheduleRunTest,
  isTestSpecTag,
  testSpecFromTag,
} from '../../services/device-farm/index.js';
import type {
  DeviceFarmService,
  ScheduleRunConfiguration,
  TestSpecTag,
  Upload,
} from '../../services/device-farm/index.js';

/**
 * Display help for the run command
 */
export function displayRunHelp(): void {
  console.log(`
Schedule a Device Farm run
==========================

Usage:
  device-farm run [options]

Options:
  --project <name>        Device Farm project (required)
  --device-pool <name>    Device pool to run on (required)
  --name <name>           Run name (required)
  --framework <tag>       Test framework (required), one of:
                          ${Object.keys(TEST_FRAMEWORK_TYPES).join(', ')}
  --tests <path>          Test package to upload (required)
  --app <path>            App to upload (.apk, .ipa or .zip)
  --extra-data <path>     Extra data archive (.zip)
  --timeout <minutes>     Job timeout (default: ${DEFAULT_JOB_TIMEOUT_MINUTES})
  -h, --help              Show this help message

Examples:
  device-farm run --project MyApp --device-pool "Top Devices" --name nightly \\
    --app app-debug.apk --framework instrumentation --tests app-debug-androidTest.apk
`);
}

export interface RunCommandArgs {
  project: string;
  devicePool: string;
  name: string;
  framework?: TestSpecTag;
  tests: string;
  app?: string;
  extraData?: string;
  jobTimeoutMinutes?: number;
  help: boolean;
  errors: string[];
}

/**
 * Parse command line arguments for the run command
 */
export function parseRunArgs(args: string[]): RunCommandArgs {
  const parsed: RunCommandArgs = {
    project: '',
    devicePool: '',
    name: '',
    tests: '',
    help: false,
    errors: [],
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '-h':
      case '--help':
        parsed.help = true;
        break;

      case '--project':
        parsed.project = args[++i] ?? '';
        break;

      case '--device-pool':
        parsed.devicePool = args[++i] ?? '';
        break;

      case '--name':
        parsed.name = args[++i] ?? '';
        break;

      case '--framework': {
        const value = args[++i] ?? '';
        if (isTestSpecTag(value)) {
          parsed.framework = value;
        } else {
          parsed.errors.push(`Unknown framework '${value}'`);
        }
        break;
      }

      case '--tests':
        parsed.tests = args[++i] ?? '';
        break;

      case '--app':
        parsed.app = args[++i];
        break;

      case '--extra-data':
        parsed.extraData = args[++i];
        break;

      case '--timeout': {
        const value = Number.parseInt(args[++i] ?? '', 10);
        if (Number.isInteger(value) && value > 0) {
          parsed.jobTimeoutMinutes = value;
        } else {
          parsed.errors.push('--timeout must be a positive number of minutes');
        }
        break;
      }

      default:
        parsed.errors.push(`Unknown argument '${arg ?? ''}'`);
        break;
    }
  }

  if (!parsed.help) {
    if (!parsed.project) parsed.errors.push('--project is required');
    if (!parsed.devicePool) parsed.errors.push('--device-pool is required');
    if (!parsed.name) parsed.errors.push('--name is required');
    if (!parsed.framework && !parsed.errors.some((e) => e.startsWith('Unknown framework'))) {
      parsed.errors.push('--framework is required');
    }
    if (!parsed.tests) parsed.errors.push('--tests is required');
  }

  return parsed;
}

function uploadedArn(upload: Upload, artifact: string): string {
  if (!upload.arn) {
    throw new Error(`Upload of ${artifact} has no ARN`);
  }
  return upload.arn;
}

/**
 * Execute the run command. Resolves with the scheduled run's ARN.
 */
export async function executeRunCommand(
  service: DeviceFarmService,
  args: string[]
): Promise<string | undefined> {
  const parsed = parseRunArgs(args);

  if (parsed.help) {
    displayRunHelp();
    return undefined;
  }

  if (parsed.errors.length > 0 || !parsed.framework) {
    throw new Error(parsed.errors.join('\n'));
  }

  const project = await service.getProject(parsed.project);
  const devicePool = await service.getDevicePool(project, parsed.devicePool);

  const appArn = parsed.app
    ? uploadedArn(await service.uploadApp(project, parsed.app), parsed.app)
    : undefined;

  const spec = testSpecFromTag(parsed.framework, parsed.tests);
  const testPackageArn = uploadedArn(await service.uploadTest(project, spec), parsed.tests);

  let configuration: ScheduleRunConfiguration | undefined;
  if (parsed.extraData) {
    const extraData = await service.uploadExtraData(project, parsed.extraData);
    configuration = { extraDataPackageArn: uploadedArn(extraData, parsed.extraData) };
  }

  const result = await service.scheduleRun({
    projectArn: project.arn ?? '',
    name: parsed.name,
    devicePoolArn: devicePool.arn ?? '',
    appArn,
    test: buildScheduleRunTest(spec, testPackageArn),
    jobTimeoutMinutes: parsed.jobTimeoutMinutes,
    configuration,
  });

  const runArn = result.run?.arn;
  console.log(`Scheduled run ${parsed.name}: ${runArn ?? 'unknown ARN'}`);
  return runArn;
}
