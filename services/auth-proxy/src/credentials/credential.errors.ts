export class CredentialError extends Error {
  /** Whether the same request may succeed if retried later. */
  public readonly retryable: boolean = false;

  public constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'CredentialError';
  }
}

/** The issuer could not be reached, timed out or reported a transient failure. */
export class IssuerUnavailableError extends CredentialError {
  public override readonly retryable = true;

  public constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'IssuerUnavailableError';
  }
}

/** The issuer refused the client, or its answer was unusable. Retrying will not help. */
export class IssuerRejectedError extends CredentialError {
  public constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'IssuerRejectedError';
  }
}

export class StartupAcquisitionFailedError extends CredentialError {
  public constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'StartupAcquisitionFailedError';
  }
}

export class CredentialTimeoutError extends CredentialError {
  public override readonly retryable = true;

  public constructor(timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms waiting for a credential`);
    this.name = 'CredentialTimeoutError';
  }
}
