export interface Credential {
  readonly token: string;
  readonly issuedAt: Date;
  readonly expiresAt: Date;
}

export function createCredential({ token, issuedAt, expiresAt }: Credential): Credential {
  return Object.freeze({
    token,
    issuedAt: new Date(issuedAt.getTime()),
    expiresAt: new Date(expiresAt.getTime()),
  });
}

/** A missing credential is stale. So is one that expires within `refreshSkewMs` of `now`. */
export function isCredentialStale(
  credential: Credential | undefined,
  refreshSkewMs: number,
  now: number = Date.now(),
): boolean {
  if (!credential) return true;
  return now >= credential.expiresAt.getTime() - refreshSkewMs;
}

export function remainingLifetimeMs(credential: Credential, now: number = Date.now()): number {
  return credential.expiresAt.getTime() - now;
}
