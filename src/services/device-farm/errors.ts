/**
 * Error types for the Device Farm service
 */

/**
 * Error codes carried by every DeviceFarmError
 */
export enum DeviceFarmErrorCode {
  /** Project or device pool name has no exact match */
  NOT_FOUND = 'NOT_FOUND',

  /** File extension matches no upload classification */
  UNRECOGNIZED_ARTIFACT_TYPE = 'UNRECOGNIZED_ARTIFACT_TYPE',

  /** Empty artifact path given to an upload */
  MISSING_ARTIFACT_PATH = 'MISSING_ARTIFACT_PATH',

  /** Artifact path does not resolve to an existing file */
  LOCAL_FILE_NOT_FOUND = 'LOCAL_FILE_NOT_FOUND',

  /** The PUT to the pre-signed URL could not be executed */
  UPLOAD_TRANSPORT_FAILURE = 'UPLOAD_TRANSPORT_FAILURE',

  /** The PUT to the pre-signed URL returned a non-200 status */
  UPLOAD_REJECTED = 'UPLOAD_REJECTED',

  /** Device Farm reported the upload as FAILED */
  UPLOAD_FAILED = 'UPLOAD_FAILED',

  /** Upload did not reach a terminal status within the wait budget */
  UPLOAD_TIMEOUT = 'UPLOAD_TIMEOUT',

  /** Wait between polls was aborted */
  WAIT_INTERRUPTED = 'WAIT_INTERRUPTED',

  CREDENTIAL_EXCHANGE_FAILED = 'CREDENTIAL_EXCHANGE_FAILED',

  INVALID_RESOURCE_NAME = 'INVALID_RESOURCE_NAME',

  UNEXPECTED_RESPONSE = 'UNEXPECTED_RESPONSE',

  UNKNOWN_ARTIFACT_OWNER = 'UNKNOWN_ARTIFACT_OWNER',

  ARTIFACT_DOWNLOAD_FAILED = 'ARTIFACT_DOWNLOAD_FAILED',

  /** Remote name cannot be used as a directory or file name */
  UNSAFE_PATH_COMPONENT = 'UNSAFE_PATH_COMPONENT',
}

/**
 * Base error class for Device Farm errors
 */
export class DeviceFarmError extends Error {
  constructor(
    message: string,
    public code: DeviceFarmErrorCode,
    cause?: Error
  ) {
    super(message, cause ? { cause } : undefined);
    this.name = 'DeviceFarmError';
  }
}

/**
 * Error thrown when a project or device pool lookup by name fails
 */
export class ResourceNotFoundError extends DeviceFarmError {
  constructor(
    public resourceType: 'Project' | 'DevicePool',
    public resourceName: string
  ) {
    super(`${resourceType} '${resourceName}' not found.`, DeviceFarmErrorCode.NOT_FOUND);
    this.name = 'ResourceNotFoundError';
  }
}

/**
 * Error thrown when an artifact's extension matches no upload type
 */
export class UnrecognizedArtifactTypeError extends DeviceFarmError {
  constructor(
    public artifact: string,
    public purpose: 'app' | 'extra data'
  ) {
    super(
      `Unknown ${purpose} artifact to upload: ${artifact}`,
      DeviceFarmErrorCode.UNRECOGNIZED_ARTIFACT_TYPE
    );
    this.name = 'UnrecognizedArtifactTypeError';
  }
}

export class MissingArtifactPathError extends DeviceFarmError {
  constructor() {
    super('Must have an artifact path.', DeviceFarmErrorCode.MISSING_ARTIFACT_PATH);
    this.name = 'MissingArtifactPathError';
  }
}

export class LocalFileNotFoundError extends DeviceFarmError {
  constructor(public artifact: string) {
    super(`File artifact ${artifact} not found.`, DeviceFarmErrorCode.LOCAL_FILE_NOT_FOUND);
    this.name = 'LocalFileNotFoundError';
  }
}

/**
 * Error thrown when the PUT request never produced a response
 */
export class UploadTransportError extends DeviceFarmError {
  constructor(public uploadName: string, cause?: Error) {
    super(
      `Upload of ${uploadName} could not be sent${cause ? `: ${cause.message}` : ''}`,
      DeviceFarmErrorCode.UPLOAD_TRANSPORT_FAILURE,
      cause
    );
    this.name = 'UploadTransportError';
  }
}

/**
 * Error thrown when the storage endpoint answers the PUT with anything but 200
 */
export class UploadRejectedError extends DeviceFarmError {
  constructor(
    public uploadName: string,
    public status: number
  ) {
    super(
      `Upload of ${uploadName} returned non-200 response: ${status}`,
      DeviceFarmErrorCode.UPLOAD_REJECTED
    );
    this.name = 'UploadRejectedError';
  }
}

/**
 * Error thrown when Device Farm finishes processing an upload as FAILED
 */
export class UploadFailedError extends DeviceFarmError {
  constructor(
    public uploadName: string,
    public metadata?: string
  ) {
    super(
      `Upload ${uploadName} failed: ${metadata ?? 'no details reported'}`,
      DeviceFarmErrorCode.UPLOAD_FAILED
    );
    this.name = 'UploadFailedError';
  }
}

export class UploadTimeoutError extends DeviceFarmError {
  constructor(
    public uploadName: string,
    public timeoutMs: number,
    public lastStatus?: string
  ) {
    super(
      `Upload ${uploadName} not ready after ${timeoutMs}ms (last status: ${lastStatus ?? 'unknown'})`,
      DeviceFarmErrorCode.UPLOAD_TIMEOUT
    );
    this.name = 'UploadTimeoutError';
  }
}

export class WaitInterruptedError extends DeviceFarmError {
  constructor(public uploadName: string, cause?: Error) {
    super(
      `Interrupted while waiting for upload ${uploadName} to complete`,
      DeviceFarmErrorCode.WAIT_INTERRUPTED,
      cause
    );
    this.name = 'WaitInterruptedError';
  }
}

/**
 * Error thrown when a role ARN cannot be exchanged for session credentials
 */
export class CredentialExchangeError extends DeviceFarmError {
  constructor(
    public roleArn: string,
    message: string,
    cause?: Error
  ) {
    super(
      `Unable to assume role ${roleArn}: ${message}`,
      DeviceFarmErrorCode.CREDENTIAL_EXCHANGE_FAILED,
      cause
    );
    this.name = 'CredentialExchangeError';
  }
}

/**
 * Error thrown when a resource name does not follow the Device Farm ARN layout
 */
export class InvalidResourceNameError extends DeviceFarmError {
  constructor(
    public resourceName: string,
    reason: string
  ) {
    super(`Invalid resource name '${resourceName}': ${reason}`, DeviceFarmErrorCode.INVALID_RESOURCE_NAME);
    this.name = 'InvalidResourceNameError';
  }
}

export class UnexpectedResponseError extends DeviceFarmError {
  constructor(
    public operation: string,
    message: string
  ) {
    super(`${operation}: ${message}`, DeviceFarmErrorCode.UNEXPECTED_RESPONSE);
    this.name = 'UnexpectedResponseError';
  }
}

/**
 * Error thrown when an artifact belongs to a test that was not listed for the run
 */
export class UnknownArtifactOwnerError extends DeviceFarmError {
  constructor(
    public artifactArn: string,
    public testPath: string
  ) {
    super(
      `Artifact ${artifactArn} belongs to unknown test ${testPath}`,
      DeviceFarmErrorCode.UNKNOWN_ARTIFACT_OWNER
    );
    this.name = 'UnknownArtifactOwnerError';
  }
}

export class ArtifactDownloadError extends DeviceFarmError {
  constructor(
    public artifactArn: string,
    public status?: number,
    cause?: Error
  ) {
    super(
      `Download of artifact ${artifactArn} failed${status !== undefined ? ` with status ${status}` : ''}${cause ? `: ${cause.message}` : ''}`,
      DeviceFarmErrorCode.ARTIFACT_DOWNLOAD_FAILED,
      cause
    );
    this.name = 'ArtifactDownloadError';
  }
}

/**
 * Error thrown when a job, suite, test or artifact name cannot be used as a path component
 */
export class UnsafePathComponentError extends DeviceFarmError {
  constructor(public component: string) {
    super(
      `Cannot use '${component}' as a file or directory name`,
      DeviceFarmErrorCode.UNSAFE_PATH_COMPONENT
    );
    this.name = 'UnsafePathComponentError';
  }
}
