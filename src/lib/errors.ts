export class TaskSafeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TaskSafeError';
  }
}

/**
 * Tag verification failed: wrong passphrase, or the envelope was altered
 */
export class AuthenticationError extends TaskSafeError {
  constructor(message = 'Authentication failed: wrong passphrase or corrupted data') {
    super(message);
    this.name = 'AuthenticationError';
  }
}

export class FormatError extends TaskSafeError {
  constructor(message: string) {
    super(message);
    this.name = 'FormatError';
  }
}

export class MissingCredentialError extends TaskSafeError {
  readonly credential: string;

  constructor(credential: string, message = `Missing credential: ${credential} is not configured`) {
    super(message);
    this.name = 'MissingCredentialError';
    this.credential = credential;
  }
}

/**
 * Non-success response from the remote store. The body is kept verbatim.
 */
export class RemoteRequestFailedError extends TaskSafeError {
  readonly status: number;
  readonly body: string;

  constructor(status: number, body: string) {
    super(`Remote request failed (${status}): ${body}`);
    this.name = 'RemoteRequestFailedError';
    this.status = status;
    this.body = body;
  }
}

export class RemoteUnavailableError extends TaskSafeError {
  constructor(message: string) {
    super(message);
    this.name = 'RemoteUnavailableError';
  }
}

export class LocalFileMissingError extends TaskSafeError {
  readonly path: string;

  constructor(path: string) {
    super(`Local file "${path}" does not exist`);
    this.name = 'LocalFileMissingError';
    this.path = path;
  }
}
