import { Redacted } from '@token-proxy/utils';
import { describe, expect, it } from 'vitest';
import { AppConfigSchema } from './app.config';
import { AzureConfigSchema, DEFAULT_SCOPE } from './azure.config';
import { TokenConfigSchema } from './token.config';
import { UpstreamConfigSchema } from './upstream.config';

describe('TokenConfigSchema', () => {
  it('defaults to a 5 minute skew and a 30 minute check interval', () => {
    expect(TokenConfigSchema.parse({})).toEqual({
      refreshSkewMinutes: 5,
      proactiveCheckIntervalMinutes: 30,
      acquisitionTimeoutMs: 30_000,
      refreshSkewMs: 300_000,
      proactiveCheckIntervalMs: 1_800_000,
    });
  });

  it('coerces overrides given as strings', () => {
    const config = TokenConfigSchema.parse({
      refreshSkewMinutes: '2',
      proactiveCheckIntervalMinutes: '0.5',
    });

    expect(config.refreshSkewMs).toBe(120_000);
    expect(config.proactiveCheckIntervalMs).toBe(30_000);
  });

  it('rejects a non-positive check interval', () => {
    expect(TokenConfigSchema.safeParse({ proactiveCheckIntervalMinutes: '0' }).success).toBe(false);
  });

  it('accepts the longest check interval a timer can wait', () => {
    const config = TokenConfigSchema.parse({ proactiveCheckIntervalMinutes: '35791' });

    expect(config.proactiveCheckIntervalMs).toBe(2_147_460_000);
  });

  it('rejects a check interval longer than a timer can wait', () => {
    expect(TokenConfigSchema.safeParse({ proactiveCheckIntervalMinutes: '35792' }).success).toBe(
      false,
    );
  });

  it('caps the refresh skew at 30 minutes', () => {
    expect(TokenConfigSchema.parse({ refreshSkewMinutes: '30' }).refreshSkewMs).toBe(1_800_000);
    expect(TokenConfigSchema.safeParse({ refreshSkewMinutes: '31' }).success).toBe(false);
  });
});

describe('AzureConfigSchema', () => {
  const required = {
    clientId: 'test-client',
    tenantId: 'test-tenant',
    certificatePath: '/etc/auth-proxy/client-certificate.pem',
  };

  it('defaults the scope, the authority and the chain flag', () => {
    const config = AzureConfigSchema.parse(required);

    expect(config.scope).toBe(DEFAULT_SCOPE);
    expect(config.authorityHost).toBe('https://login.microsoftonline.com');
    expect(config.sendCertificateChain).toBe(false);
    expect(config.certificatePassword).toBeUndefined();
  });

  it('wraps the certificate password', () => {
    const config = AzureConfigSchema.parse({
      ...required,
      certificatePassword: 'test-secret',
      sendCertificateChain: 'true',
    });

    expect(config.certificatePassword).toBeInstanceOf(Redacted);
    expect(config.certificatePassword?.value).toBe('test-secret');
    expect(JSON.stringify(config)).not.toContain('test-secret');
    expect(config.sendCertificateChain).toBe(true);
  });

  it('requires a client ID', () => {
    const result = AzureConfigSchema.safeParse({ ...required, clientId: '' });

    expect(result.success).toBe(false);
    expect(result.error?.issues[0]?.path).toEqual(['clientId']);
  });
});

describe('UpstreamConfigSchema', () => {
  it('strips trailing slashes from the base URL', () => {
    expect(
      UpstreamConfigSchema.parse({ apiBaseUrl: 'https://upstream.test.example.com/openai/' }),
    ).toEqual({
      apiBaseUrl: 'https://upstream.test.example.com/openai',
      timeoutMs: 120_000,
    });
  });

  it('rejects a base URL that is not http(s)', () => {
    expect(UpstreamConfigSchema.safeParse({ apiBaseUrl: 'not a url' }).success).toBe(false);
  });
});

describe('AppConfigSchema', () => {
  it('binds to all interfaces on port 8080 and conceals diagnostics by default', () => {
    const config = AppConfigSchema.parse({});

    expect(config.host).toBe('0.0.0.0');
    expect(config.port).toBe(8080);
    expect(config.logLevel).toBe('info');
    expect(config.logsDiagnosticsDataPolicy).toBe('conceal');
    expect(config.isDev).toBe(false);
  });
});
