/**
 * Device Farm Service
 *
 * Client for AWS Device Farm test runs
 * - Project, device pool and device discovery
 * - App, test package and extra data uploads
 * - Run scheduling
 * - Artifact download into a job/suite/test directory tree
 */

export {
  DeviceFarmService,
  DEFAULT_REGION,
  DEFAULT_USER_AGENT,
  DEFAULT_JOB_TIMEOUT_MINUTES,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_UPLOAD_TIMEOUT_MS,
} from './device-farm-service.js';
export { ArtifactCollector, ARTIFACT_CATEGORIES } from './artifact-collector.js';
export type { RunResultSource } from './artifact-collector.js';
export { assumeRole, createSessionName } from './credentials.js';

export {
  TEST_FRAMEWORK_TYPES,
  classifyAppArtifact,
  classifyExtraDataArtifact,
  platformForAppArtifact,
  testSpecTag,
  testUploadType,
  buildScheduleRunTest,
  isTestSpecTag,
  testSpecFromTag,
} from './upload-types.js';

export {
  ARN_SEGMENT_COUNT,
  RESOURCE_TYPE_SEGMENT,
  RESOURCE_PATH_SEGMENT,
  splitArn,
  resourcePathOf,
  deriveArn,
  splitResourcePath,
  shortIdOf,
  artifactFileName,
  safePathComponent,
} from './arn.js';
export type { ResourceType } from './arn.js';

// Export all types
export type {
  AccountSettings,
  AppiumLanguage,
  Artifact,
  ArtifactCategory,
  ArtifactCollection,
  CreateDeviceFarmServiceOptions,
  Device,
  DeviceFarmAuth,
  DeviceFarmCredentials,
  DeviceFarmServiceOptions,
  DevicePool,
  Job,
  ProgressWriter,
  Project,
  ProjectRef,
  Run,
  ScheduleRunCommandOutput,
  ScheduleRunConfiguration,
  ScheduleRunParams,
  ScheduleRunTest,
  SleepFunction,
  Suite,
  Test,
  TestFrameworkTypes,
  TestSpec,
  TestSpecTag,
  TestType,
  Upload,
  UploadOptions,
  UploadType,
} from './types.js';

// Export all errors
export {
  DeviceFarmError,
  DeviceFarmErrorCode,
  ResourceNotFoundError,
  UnrecognizedArtifactTypeError,
  MissingArtifactPathError,
  LocalFileNotFoundError,
  UploadTransportError,
  UploadRejectedError,
  UploadFailedError,
  UploadTimeoutError,
  WaitInterruptedError,
  CredentialExchangeError,
  InvalidResourceNameError,
  UnexpectedResponseError,
  UnknownArtifactOwnerError,
  ArtifactDownloadError,
  UnsafePathComponentError,
} from './errors.js';

// Convenience functions
import { DeviceFarmService } from './device-farm-service.js';
import type { CreateDeviceFarmServiceOptions, DeviceFarmAuth } from './types.js';

/**
 * Create a Device Farm service from credentials or a role ARN
 */
export async function createDeviceFarmService(
  auth: DeviceFarmAuth,
  options?: CreateDeviceFarmServiceOptions
): Promise<DeviceFarmService> {
  return DeviceFarmService.create(auth, options);
}
