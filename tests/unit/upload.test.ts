/**
 * Upload execution tests: validation, transfer and processing wait
 */

import { describe, it, beforeEach, afterEach, mock } from 'node:test';
import assert from 'node:assert';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { CreateUploadCommand, GetUploadCommand } from '@aws-sdk/client-device-farm';
import {
  DeviceFarmService,
  LocalFileNotFoundError,
  MissingArtifactPathError,
  UploadFailedError,
  UploadRejectedError,
  UploadTimeoutError,
  UploadTransportError,
  WaitInterruptedError,
} from '../../src/services/device-farm/index.js';
import {
  PROJECT_ARN,
  createFakeDeviceFarm,
  createLineWriter,
  createRecordingSleep,
  mockFetch,
} from '../fixtures/device-farm.fixture.js';

const PROJECT = { name: 'Checkout', arn: PROJECT_ARN };
const UPLOAD_ARN = 'arn:aws:devicefarm:us-west-2:123456789012:upload:proj-1/upload-1';
const UPLOAD_URL = 'https://uploads.example.test/upload-1?signature=test-signature';

/**
 * Fake answering CreateUpload with a slot and GetUpload with `statuses` in order
 */
function uploadFake(statuses: Array<{ status: string; metadata?: string }>) {
  let polls = 0;
  return createFakeDeviceFarm((command) => {
    if (command instanceof CreateUploadCommand) {
      return {
        upload: {
          arn: UPLOAD_ARN,
          url: UPLOAD_URL,
          name: command.input.name,
          type: command.input.type,
          status: 'INITIALIZED',
        },
      };
    }
    if (command instanceof GetUploadCommand) {
      const next = statuses[Math.min(polls, statuses.length - 1)];
      polls++;
      return { upload: { arn: UPLOAD_ARN, ...next } };
    }
    throw new Error('unexpected command');
  });
}

function countOf(commands: object[], type: typeof GetUploadCommand | typeof CreateUploadCommand): number {
  return commands.filter((command) => command instanceof type).length;
}

describe('DeviceFarmService upload', () => {
  let dir: string;
  let appPath: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'device-farm-upload-'));
    appPath = join(dir, 'app-debug.apk');
    await writeFile(appPath, 'apk-bytes');
  });

  afterEach(async () => {
    mock.restoreAll();
    await rm(dir, { recursive: true, force: true });
  });

  describe('Artifact validation', () => {
    it('should reject an empty artifact path', async () => {
      const fake = uploadFake([{ status: 'SUCCEEDED' }]);
      const service = new DeviceFarmService(fake.client);

      await assert.rejects(service.upload(PROJECT, '', 'ANDROID_APP'), MissingArtifactPathError);
      assert.strictEqual(fake.commands.length, 0);
    });

    it('should reject a path that does not exist', async () => {
      const fake = uploadFake([{ status: 'SUCCEEDED' }]);
      const service = new DeviceFarmService(fake.client);
      const missing = join(dir, 'missing.apk');

      await assert.rejects(
        service.upload(PROJECT, missing, 'ANDROID_APP'),
        (error: unknown) =>
          error instanceof LocalFileNotFoundError &&
          error.message === `File artifact ${missing} not found.`
      );
      assert.strictEqual(fake.commands.length, 0);
    });

    it('should reject a directory', async () => {
      const service = new DeviceFarmService(uploadFake([{ status: 'SUCCEEDED' }]).client);
      await assert.rejects(service.upload(PROJECT, dir, 'ANDROID_APP'), LocalFileNotFoundError);
    });

    it('should classify before touching the service', async () => {
      const fake = uploadFake([{ status: 'SUCCEEDED' }]);
      const service = new DeviceFarmService(fake.client);

      await assert.rejects(service.uploadApp(PROJECT, join(dir, 'app.aab')), {
        name: 'UnrecognizedArtifactTypeError',
      });
      assert.strictEqual(fake.commands.length, 0);
    });
  });

  describe('Transfer', () => {
    it('should create the upload and PUT the file bytes to the pre-signed URL', async () => {
      const fake = uploadFake([{ status: 'SUCCEEDED' }]);
      const calls = mockFetch(() => new Response(null, { status: 200 }));
      const service = new DeviceFarmService(fake.client, { sleep: createRecordingSleep().sleep });

      const upload = await service.uploadApp(PROJECT, appPath);

      assert.strictEqual(upload.arn, UPLOAD_ARN);
      assert.strictEqual(upload.status, 'SUCCEEDED');

      const create = fake.commands[0];
      assert.ok(create instanceof CreateUploadCommand);
      assert.deepStrictEqual(create.input, {
        name: 'app-debug.apk',
        projectArn: PROJECT_ARN,
        contentType: 'application/octet-stream',
        type: 'ANDROID_APP',
      });

      assert.strictEqual(calls.length, 1);
      const call = calls[0];
      assert.strictEqual(call?.url, UPLOAD_URL);
      assert.strictEqual(call?.init?.method, 'PUT');
      assert.deepStrictEqual(call?.init?.headers, { 'Content-Type': 'application/octet-stream' });
      const body = call?.init?.body;
      assert.ok(Buffer.isBuffer(body));
      assert.strictEqual(body.toString('utf8'), 'apk-bytes');
    });

    it('should upload test packages with the framework upload type', async () => {
      const fake = uploadFake([{ status: 'SUCCEEDED' }]);
      mockFetch(() => new Response(null, { status: 200 }));
      const service = new DeviceFarmService(fake.client);
      const testsPath = join(dir, 'tests.zip');
      await writeFile(testsPath, 'zip-bytes');

      await service.uploadTest(PROJECT, {
        framework: 'appium',
        language: 'python',
        web: false,
        path: testsPath,
      });

      const create = fake.commands[0];
      assert.ok(create instanceof CreateUploadCommand);
      assert.strictEqual(create.input.type, 'APPIUM_PYTHON_TEST_PACKAGE');
      assert.strictEqual(create.input.name, 'tests.zip');
    });

    it('should wrap a transport failure', async () => {
      const fake = uploadFake([{ status: 'SUCCEEDED' }]);
      mockFetch(() => {
        throw new TypeError('fetch failed');
      });
      const service = new DeviceFarmService(fake.client);

      await assert.rejects(
        service.uploadApp(PROJECT, appPath),
        (error: unknown) =>
          error instanceof UploadTransportError &&
          error.uploadName === 'app-debug.apk' &&
          error.cause instanceof TypeError
      );
      assert.strictEqual(countOf(fake.commands, GetUploadCommand), 0);
    });

    it('should reject a non-200 PUT response without polling', async () => {
      const fake = uploadFake([{ status: 'SUCCEEDED' }]);
      mockFetch(() => new Response('denied', { status: 403 }));
      const service = new DeviceFarmService(fake.client);

      await assert.rejects(
        service.uploadApp(PROJECT, appPath),
        (error: unknown) =>
          error instanceof UploadRejectedError &&
          error.status === 403 &&
          error.message === 'Upload of app-debug.apk returned non-200 response: 403'
      );
      assert.strictEqual(countOf(fake.commands, GetUploadCommand), 0);
    });

    it('should treat other 2xx statuses as rejected', async () => {
      mockFetch(() => new Response(null, { status: 204 }));
      const service = new DeviceFarmService(uploadFake([{ status: 'SUCCEEDED' }]).client);

      await assert.rejects(service.uploadApp(PROJECT, appPath), UploadRejectedError);
    });
  });

  describe('Processing wait', () => {
    it('should poll until the upload succeeds, sleeping between polls', async () => {
      const fake = uploadFake([{ status: 'PENDING' }, { status: 'PROCESSING' }, { status: 'SUCCEEDED' }]);
      mockFetch(() => new Response(null, { status: 200 }));
      const recording = createRecordingSleep();
      const writer = createLineWriter();
      const service = new DeviceFarmService(fake.client, { sleep: recording.sleep, writer });

      const upload = await service.uploadApp(PROJECT, appPath);

      assert.strictEqual(upload.status, 'SUCCEEDED');
      assert.strictEqual(countOf(fake.commands, GetUploadCommand), 3);
      assert.deepStrictEqual(recording.delays, [5000, 5000]);
      assert.deepStrictEqual(writer.lines, [
        '[DeviceFarm] Uploading app-debug.apk to S3',
        '[DeviceFarm] Waiting for upload app-debug.apk to be ready (current status: PENDING)',
        '[DeviceFarm] Waiting for upload app-debug.apk to be ready (current status: PROCESSING)',
        '[DeviceFarm] Upload app-debug.apk succeeded',
      ]);
    });

    it('should compare statuses case-insensitively', async () => {
      const fake = uploadFake([{ status: 'succeeded' }]);
      mockFetch(() => new Response(null, { status: 200 }));
      const recording = createRecordingSleep();
      const service = new DeviceFarmService(fake.client, { sleep: recording.sleep });

      await service.uploadApp(PROJECT, appPath);
      assert.deepStrictEqual(recording.delays, []);
    });

    it('should use the configured poll interval', async () => {
      const fake = uploadFake([{ status: 'PENDING' }, { status: 'SUCCEEDED' }]);
      mockFetch(() => new Response(null, { status: 200 }));
      const recording = createRecordingSleep();
      const service = new DeviceFarmService(fake.client, { sleep: recording.sleep, pollIntervalMs: 250 });

      await service.uploadApp(PROJECT, appPath);
      assert.deepStrictEqual(recording.delays, [250]);
    });

    it('should raise UploadFailedError carrying the service metadata', async () => {
      const metadata = '{"errorCode":"INVALID_APK"}';
      const fake = uploadFake([{ status: 'PROCESSING' }, { status: 'FAILED', metadata }]);
      mockFetch(() => new Response(null, { status: 200 }));
      const writer = createLineWriter();
      const service = new DeviceFarmService(fake.client, {
        sleep: createRecordingSleep().sleep,
        writer,
      });

      await assert.rejects(
        service.uploadApp(PROJECT, appPath),
        (error: unknown) =>
          error instanceof UploadFailedError &&
          error.metadata === metadata &&
          error.message === `Upload app-debug.apk failed: ${metadata}`
      );
      assert.strictEqual(
        writer.lines[writer.lines.length - 1],
        `[DeviceFarm] Error message from device farm: '${metadata}'`
      );
    });

    it('should give up once the wait budget would be exceeded', async () => {
      const fake = uploadFake([{ status: 'PROCESSING' }]);
      mockFetch(() => new Response(null, { status: 200 }));
      const recording = createRecordingSleep();
      const service = new DeviceFarmService(fake.client, {
        sleep: recording.sleep,
        pollIntervalMs: 5000,
        uploadTimeoutMs: 12000,
      });

      await assert.rejects(
        service.uploadApp(PROJECT, appPath),
        (error: unknown) =>
          error instanceof UploadTimeoutError &&
          error.timeoutMs === 12000 &&
          error.lastStatus === 'PROCESSING'
      );
      assert.strictEqual(countOf(fake.commands, GetUploadCommand), 3);
      assert.deepStrictEqual(recording.delays, [5000, 5000]);
    });

    it('should wait without bound when the timeout is 0', async () => {
      const statuses = Array.from({ length: 6 }, () => ({ status: 'PENDING' }));
      const fake = uploadFake([...statuses, { status: 'SUCCEEDED' }]);
      mockFetch(() => new Response(null, { status: 200 }));
      const recording = createRecordingSleep();
      const service = new DeviceFarmService(fake.client, {
        sleep: recording.sleep,
        pollIntervalMs: 5000,
        uploadTimeoutMs: 0,
      });

      await service.uploadApp(PROJECT, appPath);
      assert.strictEqual(recording.delays.length, 6);
    });

    it('should raise WaitInterruptedError when the wait is aborted', async () => {
      const fake = uploadFake([{ status: 'PENDING' }]);
      mockFetch(() => new Response(null, { status: 200 }));
      const controller = new AbortController();
      controller.abort();
      const service = new DeviceFarmService(fake.client, { sleep: createRecordingSleep().sleep });

      await assert.rejects(
        service.uploadApp(PROJECT, appPath, { signal: controller.signal }),
        (error: unknown) =>
          error instanceof WaitInterruptedError && error.uploadName === 'app-debug.apk'
      );
      assert.strictEqual(countOf(fake.commands, GetUploadCommand), 1);
    });

    it('should interrupt the default timer wait when aborted', async () => {
      const fake = uploadFake([{ status: 'PENDING' }]);
      mockFetch(() => new Response(null, { status: 200 }));
      const controller = new AbortController();
      const writer = {
        write(chunk: string) {
          if (chunk.includes('Waiting for upload')) {
            setTimeout(() => controller.abort(), 10);
          }
        },
      };
      const service = new DeviceFarmService(fake.client, { writer, pollIntervalMs: 60_000 });

      const started = Date.now();
      await assert.rejects(
        service.uploadApp(PROJECT, appPath, { signal: controller.signal }),
        (error: unknown) =>
          error instanceof WaitInterruptedError &&
          error.cause instanceof Error &&
          error.cause.name === 'AbortError'
      );
      assert.ok(Date.now() - started < 60_000);
      assert.strictEqual(countOf(fake.commands, GetUploadCommand), 1);
    });

    it('should rethrow sleep failures that are not aborts', async () => {
      const fake = uploadFake([{ status: 'PENDING' }]);
      mockFetch(() => new Response(null, { status: 200 }));
      const service = new DeviceFarmService(fake.client, {
        sleep: async () => {
          throw new Error('timer failure');
        },
      });

      await assert.rejects(service.uploadApp(PROJECT, appPath), { message: 'timer failure' });
    });
  });
});
