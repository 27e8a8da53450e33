export type MonitorErrorCode = 'REMOTE_QUERY' | 'TRANSPORT' | 'SIREN_PROTOCOL';

export abstract class MonitorError extends Error {
  abstract readonly code: MonitorErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Non-success status from the build server, or no usable document in the body. */
export class RemoteQueryError extends MonitorError {
  readonly code = 'REMOTE_QUERY';

  constructor(
    message: string,
    readonly path: string,
    readonly status?: number,
  ) {
    super(message);
  }
}

export class TransportError extends MonitorError {
  readonly code = 'TRANSPORT';

  constructor(
    message: string,
    readonly path: string,
    cause?: unknown,
  ) {
    super(message, { cause });
  }
}

export class SirenProtocolError extends MonitorError {
  readonly code = 'SIREN_PROTOCOL';

  constructor(
    message: string,
    readonly command: string,
    readonly response?: string,
    cause?: unknown,
  ) {
    super(message, { cause });
  }
}

export type QueryError = RemoteQueryError | TransportError;
