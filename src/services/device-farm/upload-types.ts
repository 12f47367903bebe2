/**
 * Upload classification
 *
 * Maps local artifacts and test package descriptions to the upload and test
 * types Device Farm expects.
 */

import { basename } from 'node:path';
import type { DevicePlatform, ScheduleRunTest, UploadType } from '@aws-sdk/client-device-farm';
import { UnrecognizedArtifactTypeError } from './errors.js';
import type { TestFrameworkTypes, TestSpec, TestSpecTag } from './types.js';

/**
 * Upload and run types per test framework
 */
export const TEST_FRAMEWORK_TYPES: Record<TestSpecTag, TestFrameworkTypes> = {
  instrumentation: { upload: 'INSTRUMENTATION_TEST_PACKAGE', run: 'INSTRUMENTATION' },
  calabash: { upload: 'CALABASH_TEST_PACKAGE', run: 'CALABASH' },
  uiautomator: { upload: 'UIAUTOMATOR_TEST_PACKAGE', run: 'UIAUTOMATOR' },
  uiautomation: { upload: 'UIAUTOMATION_TEST_PACKAGE', run: 'UIAUTOMATION' },
  xctest: { upload: 'XCTEST_TEST_PACKAGE', run: 'XCTEST' },
  'xctest-ui': { upload: 'XCTEST_UI_TEST_PACKAGE', run: 'XCTEST_UI' },
  'appium-java-testng': { upload: 'APPIUM_JAVA_TESTNG_TEST_PACKAGE', run: 'APPIUM_JAVA_TESTNG' },
  'appium-java-junit': { upload: 'APPIUM_JAVA_JUNIT_TEST_PACKAGE', run: 'APPIUM_JAVA_JUNIT' },
  'appium-python': { upload: 'APPIUM_PYTHON_TEST_PACKAGE', run: 'APPIUM_PYTHON' },
  'appium-web-java-testng': {
    upload: 'APPIUM_WEB_JAVA_TESTNG_TEST_PACKAGE',
    run: 'APPIUM_WEB_JAVA_TESTNG',
  },
  'appium-web-java-junit': {
    upload: 'APPIUM_WEB_JAVA_JUNIT_TEST_PACKAGE',
    run: 'APPIUM_WEB_JAVA_JUNIT',
  },
  'appium-web-python': { upload: 'APPIUM_WEB_PYTHON_TEST_PACKAGE', run: 'APPIUM_WEB_PYTHON' },
};

/**
 * Case-insensitive suffix test on the file name; `.apk` alone counts as an .apk file
 */
function hasExtension(artifact: string, extension: string): boolean {
  return basename(artifact).toLowerCase().endsWith(extension);
}

/**
 * Upload type for an application artifact
 */
export function classifyAppArtifact(artifact: string): UploadType {
  if (hasExtension(artifact, '.apk')) {
    return 'ANDROID_APP';
  }
  if (hasExtension(artifact, '.ipa') || hasExtension(artifact, '.zip')) {
    return 'IOS_APP';
  }
  throw new UnrecognizedArtifactTypeError(artifact, 'app');
}

/**
 * Upload type for an extra data archive
 */
export function classifyExtraDataArtifact(artifact: string): UploadType {
  if (hasExtension(artifact, '.zip')) {
    return 'EXTERNAL_DATA';
  }
  throw new UnrecognizedArtifactTypeError(artifact, 'extra data');
}

/**
 * Platform an application artifact runs on
 */
export function platformForAppArtifact(artifact: string): DevicePlatform {
  if (hasExtension(artifact, '.apk')) {
    return 'ANDROID';
  }
  if (hasExtension(artifact, '.ipa')) {
    return 'IOS';
  }
  throw new UnrecognizedArtifactTypeError(artifact, 'app');
}

export function testSpecTag(spec: TestSpec): TestSpecTag {
  if (spec.framework === 'appium') {
    return spec.web ? `appium-web-${spec.language}` : `appium-${spec.language}`;
  }
  return spec.framework;
}

export function testUploadType(spec: TestSpec): UploadType {
  return TEST_FRAMEWORK_TYPES[testSpecTag(spec)].upload;
}

/**
 * Test section of a ScheduleRun request for an uploaded test package
 */
export function buildScheduleRunTest(spec: TestSpec, testPackageArn: string): ScheduleRunTest {
  const test: ScheduleRunTest = {
    type: TEST_FRAMEWORK_TYPES[testSpecTag(spec)].run,
    testPackageArn,
  };

  if (spec.framework === 'instrumentation' && spec.filter) {
    test.filter = spec.filter;
  }

  if (spec.framework === 'calabash') {
    const parameters: Record<string, string> = {};
    if (spec.tags) {
      parameters.tags = spec.tags;
    }
    if (spec.profile) {
      parameters.profile = spec.profile;
    }
    if (Object.keys(parameters).length > 0) {
      test.parameters = parameters;
    }
  }

  return test;
}

export function isTestSpecTag(value: string): value is TestSpecTag {
  return Object.prototype.hasOwnProperty.call(TEST_FRAMEWORK_TYPES, value);
}

/**
 * Build a TestSpec from a framework tag and test package path
 */
export function testSpecFromTag(tag: TestSpecTag, path: string): TestSpec {
  switch (tag) {
    case 'appium-java-testng':
      return { framework: 'appium', language: 'java-testng', web: false, path };
    case 'appium-java-junit':
      return { framework: 'appium', language: 'java-junit', web: false, path };
    case 'appium-python':
      return { framework: 'appium', language: 'python', web: false, path };
    case 'appium-web-java-testng':
      return { framework: 'appium', language: 'java-testng', web: true, path };
    case 'appium-web-java-junit':
      return { framework: 'appium', language: 'java-junit', web: true, path };
    case 'appium-web-python':
      return { framework: 'appium', language: 'python', web: true, path };
    default:
      return { framework: tag, path };
  }
}
