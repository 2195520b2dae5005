import type { Credential } from './credential';

/**
 * Source of fresh credentials. Declared as an abstract class so it doubles as the injection
 * token; implementations reject with `IssuerUnavailableError` or `IssuerRejectedError`.
 */
export abstract class CredentialIssuer {
  public abstract issue(scope: string): Promise<Credential>;
}
