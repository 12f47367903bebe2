/**
 * Role credential exchange and service construction tests
 */

import { describe, it, afterEach, mock } from 'node:test';
import assert from 'node:assert';
import { AssumeRoleCommand, STSClient } from '@aws-sdk/client-sts';
import {
  CredentialExchangeError,
  DeviceFarmService,
  assumeRole,
  createSessionName,
} from '../../src/services/device-farm/index.js';
import { TEST_CREDENTIALS } from '../fixtures/device-farm.fixture.js';

const ROLE_ARN = 'arn:aws:iam::123456789012:role/device-farm-runner';
const EXPIRATION = new Date('2030-01-01T00:00:00Z');

function createFakeSts(handler: (command: AssumeRoleCommand) => unknown): {
  sts: STSClient;
  commands: AssumeRoleCommand[];
} {
  const sts = new STSClient({ region: 'us-west-2', credentials: TEST_CREDENTIALS });
  const commands: AssumeRoleCommand[] = [];
  mock.method(sts, 'send', async (command: object) => {
    if (!(command instanceof AssumeRoleCommand)) {
      throw new Error('unexpected command');
    }
    commands.push(command);
    return handler(command);
  });
  return { sts, commands };
}

const SESSION_CREDENTIALS = {
  Credentials: {
    AccessKeyId: 'test-session-key',
    SecretAccessKey: 'test-secret',
    SessionToken: 'test-session-token',
    Expiration: EXPIRATION,
  },
};

describe('Role credentials', () => {
  afterEach(() => {
    mock.restoreAll();
  });

  describe('createSessionName', () => {
    it('should add eight alphanumeric characters to the prefix', () => {
      for (let i = 0; i < 20; i++) {
        assert.match(createSessionName(), /^device-farm-[A-Za-z0-9]{8}$/);
      }
    });
  });

  describe('assumeRole', () => {
    it('should exchange the role for session credentials', async () => {
      const { sts, commands } = createFakeSts(() => SESSION_CREDENTIALS);

      const credentials = await assumeRole(ROLE_ARN, sts);

      assert.deepStrictEqual(credentials, {
        accessKeyId: 'test-session-key',
        secretAccessKey: 'test-secret',
        sessionToken: 'test-session-token',
        expiration: EXPIRATION,
      });
      assert.strictEqual(commands.length, 1);
      assert.strictEqual(commands[0]?.input.RoleArn, ROLE_ARN);
      assert.match(commands[0]?.input.RoleSessionName ?? '', /^device-farm-[A-Za-z0-9]{8}$/);
    });

    it('should wrap STS failures', async () => {
      const { sts } = createFakeSts(() => {
        throw new Error('AccessDenied');
      });

      await assert.rejects(
        assumeRole(ROLE_ARN, sts),
        (error: unknown) =>
          error instanceof CredentialExchangeError &&
          error.roleArn === ROLE_ARN &&
          error.message === `Unable to assume role ${ROLE_ARN}: AccessDenied` &&
          error.cause instanceof Error
      );
    });

    it('should reject a response without credentials', async () => {
      const { sts } = createFakeSts(() => ({}));

      await assert.rejects(assumeRole(ROLE_ARN, sts), {
        message: `Unable to assume role ${ROLE_ARN}: response carried no credentials`,
      });
    });
  });

  describe('DeviceFarmService.create', () => {
    it('should build a service from static credentials without STS', async () => {
      const { sts, commands } = createFakeSts(() => SESSION_CREDENTIALS);

      const service = await DeviceFarmService.create({ credentials: TEST_CREDENTIALS }, {}, sts);

      assert.ok(service instanceof DeviceFarmService);
      assert.strictEqual(commands.length, 0);
    });

    it('should assume the role before building the service', async () => {
      const { sts, commands } = createFakeSts(() => SESSION_CREDENTIALS);

      const service = await DeviceFarmService.create({ roleArn: ROLE_ARN }, { region: 'us-west-2' }, sts);

      assert.ok(service instanceof DeviceFarmService);
      assert.strictEqual(commands.length, 1);
    });

    it('should fail construction when the role exchange fails', async () => {
      const { sts } = createFakeSts(() => {
        throw new Error('ExpiredToken');
      });

      await assert.rejects(DeviceFarmService.create({ roleArn: ROLE_ARN }, {}, sts), CredentialExchangeError);
    });
  });
});
