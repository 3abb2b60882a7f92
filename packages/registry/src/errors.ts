/**
 * Error kinds surfaced by the registry client.
 */
export enum RegistryErrorCode {
  INVALID_REQUEST = 'invalid_request',
  CLIENT_ERROR = 'client_error',
  SERVER_ERROR = 'server_error',
  NETWORK_ERROR = 'network_error',
  INVALID_RESPONSE = 'invalid_response',
}

const MAX_BODY_IN_MESSAGE = 512;

/**
 * Failure talking to the registry. `isRetryable` marks the transient kinds
 * (5xx and transport failures); these are only surfaced once the client's
 * retries are exhausted.
 */
export class RegistryError extends Error {
  public readonly code: RegistryErrorCode;
  public readonly isRetryable: boolean;
  public readonly status?: number;
  /** Response body, kept for diagnostics */
  public readonly body?: string;

  public constructor(
    message: string,
    code: RegistryErrorCode,
    options: { status?: number; body?: string; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = 'RegistryError';
    this.code = code;
    this.status = options.status;
    this.body = options.body;
    this.isRetryable =
      code === RegistryErrorCode.SERVER_ERROR ||
      code === RegistryErrorCode.NETWORK_ERROR;

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, RegistryError.prototype);
  }

  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      status: this.status,
      isRetryable: this.isRetryable,
    };
  }

  public static fromStatus(status: number, body: string): RegistryError {
    const excerpt =
      body.length > MAX_BODY_IN_MESSAGE
        ? `${body.slice(0, MAX_BODY_IN_MESSAGE)}...`
        : body;
    const code =
      status >= 500
        ? RegistryErrorCode.SERVER_ERROR
        : RegistryErrorCode.CLIENT_ERROR;
    return new RegistryError(
      `unexpected status code ${status}: ${excerpt}`,
      code,
      { status, body },
    );
  }

  public static networkError(attempts: number, cause: unknown): RegistryError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new RegistryError(
      `failed to execute request after ${attempts} attempts: ${reason}`,
      RegistryErrorCode.NETWORK_ERROR,
      { cause },
    );
  }

  public static invalidResponse(detail: string, cause?: unknown): RegistryError {
    return new RegistryError(
      `failed to decode response: ${detail}`,
      RegistryErrorCode.INVALID_RESPONSE,
      { cause },
    );
  }
}

/**
 * The registry has no record for the requested id, name or version.
 */
export class ServerNotFoundError extends Error {
  public constructor(
    public readonly identifier: string,
    message = `server not found: ${identifier}`,
  ) {
    super(message);
    this.name = 'ServerNotFoundError';
    Object.setPrototypeOf(this, ServerNotFoundError.prototype);
  }
}

/**
 * A server name that is not of the form `namespace/name`.
 */
export class InvalidServerNameError extends Error {
  public constructor(
    public readonly input: string,
    reason: string,
  ) {
    super(`invalid server name format "${input}": ${reason}`);
    this.name = 'InvalidServerNameError';
    Object.setPrototypeOf(this, InvalidServerNameError.prototype);
  }
}
