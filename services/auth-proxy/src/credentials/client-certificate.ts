import { createPrivateKey, KeyObject, X509Certificate } from 'node:crypto';
import { readFileSync } from 'node:fs';
import { Redacted } from '@token-proxy/utils';
import { IssuerRejectedError } from './credential.errors';

export interface ClientCertificate {
  /** PKCS#8 PEM, decrypted. */
  privateKey: string;
  /** Hex SHA-256 of the leaf certificate, as MSAL expects it. */
  thumbprintSha256: string;
  /** Leaf certificate followed by the rest of the chain, for the `x5c` header. */
  x5c: string;
}

const PRIVATE_KEY_PATTERN =
  /-----BEGIN (?:ENCRYPTED |RSA |EC )?PRIVATE KEY-----[\s\S]+?-----END (?:ENCRYPTED |RSA |EC )?PRIVATE KEY-----/;
const CERTIFICATE_PATTERN = /-----BEGIN CERTIFICATE-----[\s\S]+?-----END CERTIFICATE-----/g;

/**
 * Reads a PEM bundle holding one private key and at least one certificate, the first of which
 * must belong to the key.
 */
export function loadClientCertificate(
  path: string,
  password?: Redacted<string>,
): ClientCertificate {
  let bundle: string;
  try {
    bundle = readFileSync(path, 'utf8');
  } catch (error) {
    throw new IssuerRejectedError(`Client certificate file ${path} could not be read`, {
      cause: error,
    });
  }

  const keyPem = bundle.match(PRIVATE_KEY_PATTERN)?.[0];
  if (!keyPem) {
    throw new IssuerRejectedError(`Client certificate file ${path} holds no private key`);
  }

  const certificates = bundle.match(CERTIFICATE_PATTERN) ?? [];
  const [leafPem] = certificates;
  if (!leafPem) {
    throw new IssuerRejectedError(`Client certificate file ${path} holds no certificate`);
  }

  let key: KeyObject;
  try {
    key = createPrivateKey({ key: keyPem, format: 'pem', passphrase: password?.value });
  } catch (error) {
    throw new IssuerRejectedError(
      'Private key could not be decoded, check AZURE_CERTIFICATE_PASSWORD',
      { cause: error },
    );
  }

  const leaf = new X509Certificate(leafPem);
  if (!leaf.checkPrivateKey(key)) {
    throw new IssuerRejectedError('Private key does not belong to the first certificate');
  }

  return {
    privateKey: key.export({ format: 'pem', type: 'pkcs8' }).toString(),
    thumbprintSha256: leaf.fingerprint256.replace(/:/g, ''),
    x5c: certificates.join('\n'),
  };
}
