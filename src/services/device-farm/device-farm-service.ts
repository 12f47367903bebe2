/**
 * Device Farm service
 *
 * Wraps the AWS Device Farm API for a test pipeline:
 * - Project, device pool, device and account discovery
 * - App, test package and extra data uploads through pre-signed URLs
 * - Run scheduling
 * - Run result listing and artifact download
 */

import { stat, readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { setTimeout as delay } from 'node:timers/promises';
import {
  CreateUploadCommand,
  DeviceFarmClient,
  GetAccountSettingsCommand,
  GetRunCommand,
  GetUploadCommand,
  ListArtifactsCommand,
  ListDevicePoolsCommand,
  ListDevicesCommand,
  ListJobsCommand,
  ListProjectsCommand,
  ListSuitesCommand,
  ListTestsCommand,
  NotFoundException,
  ScheduleRunCommand,
} from '@aws-sdk/client-device-farm';
import type { ScheduleRunCommandInput } from '@aws-sdk/client-device-farm';
import { STSClient } from '@aws-sdk/client-sts';
import { createModuleLogger } from '../../utils/logger.js';
import { ArtifactCollector } from './artifact-collector.js';
import { assumeRole } from './credentials.js';
import {
  LocalFileNotFoundError,
  MissingArtifactPathError,
  ResourceNotFoundError,
  UnexpectedResponseError,
  UploadFailedError,
  UploadRejectedError,
  UploadTimeoutError,
  UploadTransportError,
  WaitInterruptedError,
} from './errors.js';
import {
  classifyAppArtifact,
  classifyExtraDataArtifact,
  testUploadType,
} from './upload-types.js';
import type {
  AccountSettings,
  Artifact,
  ArtifactCategory,
  ArtifactCollection,
  CreateDeviceFarmServiceOptions,
  Device,
  DeviceFarmAuth,
  DeviceFarmServiceOptions,
  DevicePool,
  Job,
  ProgressWriter,
  Project,
  ProjectRef,
  Run,
  ScheduleRunCommandOutput,
  ScheduleRunParams,
  SleepFunction,
  Suite,
  Test,
  TestSpec,
  Upload,
  UploadOptions,
  UploadType,
} from './types.js';

const logger = createModuleLogger('device-farm');

/** Device Farm is only served from us-west-2 */
export const DEFAULT_REGION = 'us-west-2';
export const DEFAULT_USER_AGENT = 'device-farm-runner/1.0';
export const DEFAULT_JOB_TIMEOUT_MINUTES = 60;
export const DEFAULT_POLL_INTERVAL_MS = 5000;
export const DEFAULT_UPLOAD_TIMEOUT_MS = 30 * 60 * 1000;

const UPLOAD_CONTENT_TYPE = 'application/octet-stream';

const defaultSleep: SleepFunction = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

/**
 * A page of results from a Device Farm list call
 */
interface Page<T> {
  items: T[] | undefined;
  nextToken: string | undefined;
}

/**
 * Follow `nextToken` until the listing is exhausted
 */
async function collectPages<T>(fetchPage: (nextToken?: string) => Promise<Page<T>>): Promise<T[]> {
  const items: T[] = [];
  let nextToken: string | undefined;
  do {
    const page = await fetchPage(nextToken);
    items.push(...(page.items ?? []));
    nextToken = page.nextToken;
  } while (nextToken);
  return items;
}

function requireArn(resource: { arn?: string; name?: string }, kind: string): string {
  if (!resource.arn) {
    throw new UnexpectedResponseError(kind, `${kind} '${resource.name ?? 'unnamed'}' has no ARN`);
  }
  return resource.arn;
}

function isMissingFileError(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'ENOTDIR')
  );
}

/**
 * Device Farm service class
 */
export class DeviceFarmService {
  private readonly api: DeviceFarmClient;
  private readonly writer: ProgressWriter | null;
  private readonly pollIntervalMs: number;
  private readonly uploadTimeoutMs: number;
  private readonly sleep: SleepFunction;

  constructor(api: DeviceFarmClient, options: DeviceFarmServiceOptions = {}) {
    this.api = api;
    this.writer = options.writer ?? null;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.uploadTimeoutMs = options.uploadTimeoutMs ?? DEFAULT_UPLOAD_TIMEOUT_MS;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Build a service from static credentials or a role to assume.
   * A failed role exchange rejects before any client is built.
   */
  static async create(
    auth: DeviceFarmAuth,
    options: CreateDeviceFarmServiceOptions = {},
    sts?: STSClient
  ): Promise<DeviceFarmService> {
    const region = options.region ?? DEFAULT_REGION;
    const credentials =
      'roleArn' in auth
        ? await assumeRole(auth.roleArn, sts ?? new STSClient({ region }))
        : auth.credentials;

    const api = new DeviceFarmClient({
      region,
      credentials,
      customUserAgent: options.userAgent ?? DEFAULT_USER_AGENT,
    });

    return new DeviceFarmService(api, options);
  }

  // Discovery

  async listProjects(): Promise<Project[]> {
    return collectPages(async (nextToken) => {
      const response = await this.api.send(new ListProjectsCommand({ nextToken }));
      return { items: response.projects, nextToken: response.nextToken };
    });
  }

  /**
   * Project with exactly the given name
   */
  async getProject(name: string): Promise<Project> {
    const projects = await this.listProjects();
    const project = projects.find((p) => p.name === name);
    if (!project) {
      throw new ResourceNotFoundError('Project', name);
    }
    return project;
  }

  async listDevicePools(projectRef: ProjectRef): Promise<DevicePool[]> {
    const project = await this.resolveProject(projectRef);
    const arn = requireArn(project, 'Project');
    return collectPages(async (nextToken) => {
      const response = await this.api.send(new ListDevicePoolsCommand({ arn, nextToken }));
      return { items: response.devicePools, nextToken: response.nextToken };
    });
  }

  /**
   * Device pool of a project with exactly the given name
   */
  async getDevicePool(projectRef: ProjectRef, name: string): Promise<DevicePool> {
    const pools = await this.listDevicePools(projectRef);
    const pool = pools.find((p) => p.name === name);
    if (!pool) {
      throw new ResourceNotFoundError('DevicePool', name);
    }
    return pool;
  }

  async listDevices(projectRef: ProjectRef): Promise<Device[]> {
    const project = await this.resolveProject(projectRef);
    const arn = requireArn(project, 'Project');
    return collectPages(async (nextToken) => {
      const response = await this.api.send(new ListDevicesCommand({ arn, nextToken }));
      return { items: response.devices, nextToken: response.nextToken };
    });
  }

  /**
   * Account settings, or undefined when the account has none
   */
  async getAccountSettings(): Promise<AccountSettings | undefined> {
    try {
      const response = await this.api.send(new GetAccountSettingsCommand({}));
      return response.accountSettings;
    } catch (error) {
      if (error instanceof NotFoundException) {
        logger.debug('Account settings not found');
        return undefined;
      }
      throw error;
    }
  }

  /**
   * Number of unmetered devices for `ANDROID` or `IOS`; 0 for anything else
   */
  async getUnmeteredDeviceCount(os: string): Promise<number> {
    const settings = await this.getAccountSettings();
    if (!settings) {
      return 0;
    }
    switch (os.toUpperCase()) {
      case 'ANDROID':
        return settings.unmeteredDevices?.ANDROID ?? 0;
      case 'IOS':
        return settings.unmeteredDevices?.IOS ?? 0;
      default:
        return 0;
    }
  }

  // Uploads

  async uploadApp(projectRef: ProjectRef, artifact: string, options?: UploadOptions): Promise<Upload> {
    return this.upload(projectRef, artifact, classifyAppArtifact(artifact), options);
  }

  async uploadExtraData(
    projectRef: ProjectRef,
    artifact: string,
    options?: UploadOptions
  ): Promise<Upload> {
    return this.upload(projectRef, artifact, classifyExtraDataArtifact(artifact), options);
  }

  async uploadTest(projectRef: ProjectRef, test: TestSpec, options?: UploadOptions): Promise<Upload> {
    return this.upload(projectRef, test.path, testUploadType(test), options);
  }

  /**
   * Upload a local file and wait until Device Farm has processed it.
   *
   * Resolves with the upload in its SUCCEEDED state.
   */
  async upload(
    projectRef: ProjectRef,
    artifact: string,
    type: UploadType,
    options: UploadOptions = {}
  ): Promise<Upload> {
    if (!artifact) {
      throw new MissingArtifactPathError();
    }

    try {
      if (!(await stat(artifact)).isFile()) {
        throw new LocalFileNotFoundError(artifact);
      }
    } catch (error) {
      if (isMissingFileError(error)) {
        throw new LocalFileNotFoundError(artifact);
      }
      throw error;
    }

    const project = await this.resolveProject(projectRef);
    const name = basename(artifact);

    const created = await this.api.send(
      new CreateUploadCommand({
        name,
        projectArn: requireArn(project, 'Project'),
        contentType: UPLOAD_CONTENT_TYPE,
        type,
      })
    );
    const upload = created.upload;
    if (!upload?.arn || !upload.url) {
      throw new UnexpectedResponseError('CreateUpload', `no upload slot returned for ${name}`);
    }
    logger.info({ name, type, uploadArn: upload.arn }, 'Created upload');

    this.progress(`Uploading ${name} to S3`);
    await this.transfer(name, artifact, upload.url, upload.contentType ?? UPLOAD_CONTENT_TYPE);

    return this.waitForUpload(name, upload.arn, options.signal);
  }

  /**
   * PUT the file bytes to the pre-signed URL
   */
  private async transfer(name: string, artifact: string, url: string, contentType: string): Promise<void> {
    const body = await readFile(artifact);

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'PUT',
        headers: { 'Content-Type': contentType },
        body,
      });
    } catch (error) {
      throw new UploadTransportError(name, error instanceof Error ? error : undefined);
    }

    if (response.status !== 200) {
      logger.error({ name, status: response.status }, 'Upload PUT rejected');
      throw new UploadRejectedError(name, response.status);
    }
    logger.debug({ name, size: body.length }, 'Upload PUT complete');
  }

  /**
   * Poll the upload until it reaches SUCCEEDED or FAILED
   */
  private async waitForUpload(name: string, arn: string, signal?: AbortSignal): Promise<Upload> {
    let waitedMs = 0;

    for (;;) {
      const response = await this.api.send(new GetUploadCommand({ arn }));
      const upload = response.upload;
      const status = upload?.status;

      switch (status?.toUpperCase()) {
        case 'SUCCEEDED':
          this.progress(`Upload ${name} succeeded`);
          return upload ?? {};
        case 'FAILED': {
          const metadata = upload?.metadata ?? upload?.message;
          this.progress(`Error message from device farm: '${metadata ?? ''}'`);
          throw new UploadFailedError(name, metadata);
        }
      }

      if (this.uploadTimeoutMs > 0 && waitedMs + this.pollIntervalMs > this.uploadTimeoutMs) {
        logger.warn({ name, status, waitedMs }, 'Upload wait budget exhausted');
        throw new UploadTimeoutError(name, this.uploadTimeoutMs, status);
      }

      this.progress(`Waiting for upload ${name} to be ready (current status: ${status ?? 'UNKNOWN'})`);
      try {
        await this.sleep(this.pollIntervalMs, signal);
      } catch (error) {
        if (signal?.aborted) {
          this.progress('Interrupted while waiting for the upload to complete');
          throw new WaitInterruptedError(name, error instanceof Error ? error : undefined);
        }
        throw error;
      }
      waitedMs += this.pollIntervalMs;
    }
  }

  // Runs

  /**
   * Schedule a run. Does not wait for the run to finish.
   */
  async scheduleRun(params: ScheduleRunParams): Promise<ScheduleRunCommandOutput> {
    const input: ScheduleRunCommandInput = {
      projectArn: params.projectArn,
      name: params.name,
      devicePoolArn: params.devicePoolArn,
      test: params.test,
    };

    if (
      params.jobTimeoutMinutes !== undefined &&
      params.jobTimeoutMinutes !== DEFAULT_JOB_TIMEOUT_MINUTES
    ) {
      input.executionConfiguration = { jobTimeoutMinutes: params.jobTimeoutMinutes };
    }

    if (params.configuration) {
      input.configuration = params.configuration;
    }

    if (params.appArn) {
      input.appArn = params.appArn;
    }

    logger.info({ projectArn: params.projectArn, name: params.name }, 'Scheduling run');
    return this.api.send(new ScheduleRunCommand(input));
  }

  async describeRun(runArn: string): Promise<Run> {
    const response = await this.api.send(new GetRunCommand({ arn: runArn }));
    if (!response.run) {
      throw new UnexpectedResponseError('GetRun', `no run returned for ${runArn}`);
    }
    return response.run;
  }

  async listArtifacts(runArn: string, category: ArtifactCategory): Promise<Artifact[]> {
    return collectPages(async (nextToken) => {
      const response = await this.api.send(
        new ListArtifactsCommand({ arn: runArn, type: category, nextToken })
      );
      return { items: response.artifacts, nextToken: response.nextToken };
    });
  }

  async listJobs(runArn: string): Promise<Job[]> {
    return collectPages(async (nextToken) => {
      const response = await this.api.send(new ListJobsCommand({ arn: runArn, nextToken }));
      return { items: response.jobs, nextToken: response.nextToken };
    });
  }

  async listSuites(jobArn: string): Promise<Suite[]> {
    return collectPages(async (nextToken) => {
      const response = await this.api.send(new ListSuitesCommand({ arn: jobArn, nextToken }));
      return { items: response.suites, nextToken: response.nextToken };
    });
  }

  async listTests(suiteArn: string): Promise<Test[]> {
    return collectPages(async (nextToken) => {
      const response = await this.api.send(new ListTestsCommand({ arn: suiteArn, nextToken }));
      return { items: response.tests, nextToken: response.nextToken };
    });
  }

  /**
   * Download every artifact of a run into `destination`, laid out as
   * `<job>-<os>/<suite>/<test>/<artifact>-<id>.<ext>`
   */
  async getArtifacts(runArn: string, destination: string): Promise<ArtifactCollection> {
    const collector = new ArtifactCollector(this, (message) => this.progress(message));
    return collector.collect(runArn, destination);
  }

  // Helpers

  private async resolveProject(projectRef: ProjectRef): Promise<Project> {
    return typeof projectRef === 'string' ? this.getProject(projectRef) : projectRef;
  }

  private progress(message: string): void {
    logger.info(message);
    this.writer?.write(`[DeviceFarm] ${message}\n`);
  }
}
