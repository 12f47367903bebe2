/**
 * Device Farm resource name helpers
 *
 * Device Farm ARNs have the shape
 *   arn:aws:devicefarm:<region>:<account>:<resourceType>:<resourcePath>
 * where resourcePath nests the owning resources, e.g. a test's path is
 *   <project>/<run>/<job>/<suite>/<test>
 * Jobs, suites, tests and artifacts of a run are addressed by rewriting the
 * run ARN's last two segments.
 */

import { InvalidResourceNameError, UnsafePathComponentError } from './errors.js';

export const ARN_SEGMENT_COUNT = 7;
export const RESOURCE_TYPE_SEGMENT = 5;
export const RESOURCE_PATH_SEGMENT = 6;

export type ResourceType = 'run' | 'job' | 'suite' | 'test' | 'artifact';

/**
 * Split an ARN into its colon-delimited segments.
 * Throws unless there are exactly ARN_SEGMENT_COUNT of them.
 */
export function splitArn(arn: string): string[] {
  const segments = arn.split(':');
  if (segments.length !== ARN_SEGMENT_COUNT) {
    throw new InvalidResourceNameError(
      arn,
      `expected ${ARN_SEGMENT_COUNT} ':'-delimited segments, got ${segments.length}`
    );
  }
  return segments;
}

/**
 * Resource path (last segment) of an ARN
 */
export function resourcePathOf(arn: string): string {
  return splitArn(arn)[RESOURCE_PATH_SEGMENT] ?? '';
}

/**
 * Copy of `arn` addressing another resource of the same account and region
 */
export function deriveArn(arn: string, resourceType: ResourceType, resourcePath: string): string {
  const segments = splitArn(arn);
  segments[RESOURCE_TYPE_SEGMENT] = resourceType;
  segments[RESOURCE_PATH_SEGMENT] = resourcePath;
  return segments.join(':');
}

/**
 * Split a resource path into the owning resource's path and the leaf id
 */
export function splitResourcePath(resourcePath: string): { parent: string; id: string } {
  const index = resourcePath.lastIndexOf('/');
  if (index < 0) {
    throw new InvalidResourceNameError(resourcePath, "resource path has no '/' separator");
  }
  return {
    parent: resourcePath.substring(0, index),
    id: resourcePath.substring(index + 1),
  };
}

/**
 * Last component of a resource path, or the whole path when it has no parent
 */
export function shortIdOf(resourcePath: string): string {
  return resourcePath.substring(resourcePath.lastIndexOf('/') + 1);
}

/**
 * Local file name for a downloaded artifact: `<name>-<id>.<extension>`
 */
export function artifactFileName(name: string, artifactId: string, extension: string): string {
  return `${name}-${artifactId}.${extension.replace(/^\./, '')}`;
}

/**
 * Turn a remote name into a single path component. Separators become `_`;
 * empty names and `.`/`..` are rejected.
 */
export function safePathComponent(name: string): string {
  const component = name.replace(/[/\\]/g, '_');
  if (component === '' || component === '.' || component === '..') {
    throw new UnsafePathComponentError(name);
  }
  return component;
}
