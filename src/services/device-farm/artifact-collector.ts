/**
 * Run artifact collection
 *
 * Mirrors a run's job → suite → test hierarchy as directories and downloads
 * every artifact into the directory of the test that produced it.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { createModuleLogger } from '../../utils/logger.js';
import {
  artifactFileName,
  deriveArn,
  resourcePathOf,
  safePathComponent,
  shortIdOf,
  splitResourcePath,
} from './arn.js';
import {
  ArtifactDownloadError,
  UnexpectedResponseError,
  UnknownArtifactOwnerError,
} from './errors.js';
import type {
  Artifact,
  ArtifactCategory,
  ArtifactCollection,
  Job,
  Suite,
  Test,
} from './types.js';

const logger = createModuleLogger('device-farm:artifacts');

export const ARTIFACT_CATEGORIES: readonly ArtifactCategory[] = ['FILE', 'LOG', 'SCREENSHOT'];

/**
 * Listing calls the collector needs
 */
export interface RunResultSource {
  listJobs(runArn: string): Promise<Job[]>;
  listSuites(jobArn: string): Promise<Suite[]>;
  listTests(suiteArn: string): Promise<Test[]>;
  listArtifacts(runArn: string, category: ArtifactCategory): Promise<Artifact[]>;
}

function arnOf(resource: { arn?: string; name?: string }, kind: string): string {
  if (!resource.arn) {
    throw new UnexpectedResponseError(`List${kind}s`, `${kind} '${resource.name ?? 'unnamed'}' has no ARN`);
  }
  return resource.arn;
}

/**
 * Artifact collector class
 */
export class ArtifactCollector {
  constructor(
    private source: RunResultSource,
    private progress: (message: string) => void = () => undefined
  ) {}

  async collect(runArn: string, destination: string): Promise<ArtifactCollection> {
    logger.info({ runArn, destination }, 'Collecting run artifacts');

    const jobs = await this.collectJobs(runArn, destination);
    const suites = await this.collectSuites(runArn, jobs);
    const tests = await this.collectTests(runArn, suites);

    const artifacts: string[] = [];
    for (const category of ARTIFACT_CATEGORIES) {
      for (const artifact of await this.source.listArtifacts(runArn, category)) {
        artifacts.push(await this.download(artifact, tests));
      }
    }

    logger.info({ runArn, count: artifacts.length }, 'Collected run artifacts');
    return { jobs, suites, tests, artifacts };
  }

  /**
   * One directory per job. Jobs may share a name, so the device OS (or the
   * job id when the device is unknown) is appended.
   */
  private async collectJobs(runArn: string, destination: string): Promise<Map<string, string>> {
    const jobs = new Map<string, string>();
    for (const job of await this.source.listJobs(runArn)) {
      const jobPath = resourcePathOf(arnOf(job, 'Job'));
      const suffix = job.device?.os || shortIdOf(jobPath);
      const dir = join(destination, safePathComponent(`${job.name ?? ''}-${suffix}`));
      await mkdir(dir, { recursive: true });
      jobs.set(jobPath, dir);
    }
    return jobs;
  }

  private async collectSuites(runArn: string, jobs: Map<string, string>): Promise<Map<string, string>> {
    const suites = new Map<string, string>();
    for (const [jobPath, jobDir] of jobs) {
      for (const suite of await this.source.listSuites(deriveArn(runArn, 'job', jobPath))) {
        const dir = join(jobDir, safePathComponent(suite.name ?? ''));
        await mkdir(dir, { recursive: true });
        suites.set(resourcePathOf(arnOf(suite, 'Suite')), dir);
      }
    }
    return suites;
  }

  private async collectTests(runArn: string, suites: Map<string, string>): Promise<Map<string, string>> {
    const tests = new Map<string, string>();
    for (const [suitePath, suiteDir] of suites) {
      for (const test of await this.source.listTests(deriveArn(runArn, 'suite', suitePath))) {
        const dir = join(suiteDir, safePathComponent(test.name ?? ''));
        await mkdir(dir, { recursive: true });
        tests.set(resourcePathOf(arnOf(test, 'Test')), dir);
      }
    }
    return tests;
  }

  private async download(artifact: Artifact, tests: Map<string, string>): Promise<string> {
    const arn = arnOf(artifact, 'Artifact');
    const { parent: testPath, id } = splitResourcePath(resourcePathOf(arn));

    const testDir = tests.get(testPath);
    if (!testDir) {
      throw new UnknownArtifactOwnerError(arn, testPath);
    }
    if (!artifact.url) {
      throw new UnexpectedResponseError('ListArtifacts', `artifact ${arn} has no URL`);
    }

    const file = join(
      testDir,
      safePathComponent(artifactFileName(artifact.name ?? '', id, artifact.extension ?? ''))
    );

    let response: Response;
    try {
      response = await fetch(artifact.url);
    } catch (error) {
      throw new ArtifactDownloadError(arn, undefined, error instanceof Error ? error : undefined);
    }
    if (!response.ok) {
      throw new ArtifactDownloadError(arn, response.status);
    }

    const bytes = Buffer.from(await response.arrayBuffer());
    await writeFile(file, bytes);

    this.progress(`Downloaded ${artifact.name ?? id} to ${file}`);
    logger.debug({ arn, file, size: bytes.length }, 'Wrote artifact');
    return file;
  }
}
