export * from './credential';
export * from './credential.errors';
export { CredentialIssuer } from './credential-issuer';
export { CredentialsModule } from './credentials.module';
export { TokenCache, type TokenCacheOptions } from './token-cache';
