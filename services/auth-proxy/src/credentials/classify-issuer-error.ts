import { ClientConfigurationError, ServerError } from '@azure/msal-node';
import { normalizeError } from '@token-proxy/utils';
import { CredentialError, IssuerRejectedError, IssuerUnavailableError } from './credential.errors';

// Entra ID answers these when it is degraded rather than when the client is at fault.
const TRANSIENT_SERVER_ERROR_CODES = new Set(['temporarily_unavailable', 'server_error']);

export function classifyIssuerError(error: unknown): CredentialError {
  if (error instanceof CredentialError) return error;

  if (error instanceof ServerError) {
    const message = `Token endpoint returned ${error.errorCode}: ${error.errorMessage}`;
    return TRANSIENT_SERVER_ERROR_CODES.has(error.errorCode)
      ? new IssuerUnavailableError(message, { cause: error })
      : new IssuerRejectedError(message, { cause: error });
  }

  if (error instanceof ClientConfigurationError) {
    return new IssuerRejectedError(`Invalid client configuration: ${error.errorCode}`, {
      cause: error,
    });
  }

  const cause = normalizeError(error);
  return new IssuerUnavailableError(`Token endpoint unreachable: ${cause.message}`, { cause });
}
