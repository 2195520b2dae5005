import { inspect } from 'node:util';

/**
 * Holds a secret (passwords, private key passphrases, bearer tokens) so that it cannot leak
 * through string interpolation, JSON logging or `util.inspect`. Read it through `.value`.
 */
export class Redacted<T> {
  public constructor(public readonly value: T) {}

  public toString() {
    return '[Redacted]';
  }

  public toJSON() {
    return this.toString();
  }

  public [inspect.custom]() {
    return this.toString();
  }
}
