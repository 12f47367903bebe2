/**
 * Types for the Device Farm service
 */

import type {
  Project,
  ScheduleRunConfiguration,
  ScheduleRunTest,
  TestType,
  UploadType,
} from '@aws-sdk/client-device-farm';

export type {
  AccountSettings,
  Artifact,
  ArtifactCategory,
  Device,
  DevicePool,
  GetRunCommandOutput,
  Job,
  ListArtifactsCommandOutput,
  Project,
  Run,
  ScheduleRunCommandOutput,
  ScheduleRunConfiguration,
  ScheduleRunTest,
  Suite,
  Test,
  TestType,
  Upload,
  UploadType,
} from '@aws-sdk/client-device-farm';

/**
 * Static AWS credentials
 */
export interface DeviceFarmCredentials {
  accessKeyId: string;
  secretAccessKey: string;
  sessionToken?: string;
  expiration?: Date;
}

/**
 * How the service authenticates: direct credentials or a role to assume
 */
export type DeviceFarmAuth =
  | { credentials: DeviceFarmCredentials }
  | { roleArn: string };

/**
 * Sink for human-readable progress lines (process.stdout, a file stream, ...)
 */
export interface ProgressWriter {
  write(chunk: string): unknown;
}

/**
 * Sleep used between upload polls. Must reject when `signal` aborts.
 */
export type SleepFunction = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Device Farm service options
 */
export interface DeviceFarmServiceOptions {
  /** Receives `[DeviceFarm] ...` progress lines; null or absent disables them */
  writer?: ProgressWriter | null;

  /** Delay between upload status polls (default: 5000) */
  pollIntervalMs?: number;

  /** Total time spent waiting on a single upload; 0 waits forever (default: 30 minutes) */
  uploadTimeoutMs?: number;

  sleep?: SleepFunction;
}

/**
 * Options for creating a service from credentials or a role
 */
export interface CreateDeviceFarmServiceOptions extends DeviceFarmServiceOptions {
  region?: string;
  userAgent?: string;
}

/**
 * Per-upload options
 */
export interface UploadOptions {
  /** Aborting rejects the pending wait with WaitInterruptedError */
  signal?: AbortSignal;
}

/**
 * A project object or the name of one
 */
export type ProjectRef = Project | string;

/**
 * Appium test package flavours
 */
export type AppiumLanguage = 'java-testng' | 'java-junit' | 'python';

/**
 * Test package description, one variant per supported framework
 */
export type TestSpec =
  | { framework: 'instrumentation'; path: string; filter?: string }
  | { framework: 'calabash'; path: string; tags?: string; profile?: string }
  | { framework: 'uiautomator'; path: string }
  | { framework: 'uiautomation'; path: string }
  | { framework: 'xctest'; path: string }
  | { framework: 'xctest-ui'; path: string }
  | { framework: 'appium'; path: string; language: AppiumLanguage; web: boolean };

export type TestSpecTag =
  | 'instrumentation'
  | 'calabash'
  | 'uiautomator'
  | 'uiautomation'
  | 'xctest'
  | 'xctest-ui'
  | 'appium-java-testng'
  | 'appium-java-junit'
  | 'appium-python'
  | 'appium-web-java-testng'
  | 'appium-web-java-junit'
  | 'appium-web-python';

/**
 * Upload and run type for a test framework
 */
export interface TestFrameworkTypes {
  upload: UploadType;
  run: TestType;
}

/**
 * Parameters of a ScheduleRun request
 */
export interface ScheduleRunParams {
  projectArn: string;
  name: string;
  devicePoolArn: string;
  test: ScheduleRunTest;
  appArn?: string | null;
  /** Attached only when it differs from the service default of 60 */
  jobTimeoutMinutes?: number;
  configuration?: ScheduleRunConfiguration | null;
}

/**
 * Local layout produced by collecting a run's artifacts
 */
export interface ArtifactCollection {
  /** Job resource path → job directory */
  jobs: Map<string, string>;
  /** Suite resource path → suite directory */
  suites: Map<string, string>;
  /** Test resource path → test directory */
  tests: Map<string, string>;
  /** Written artifact files, in write order */
  artifacts: string[];
}
