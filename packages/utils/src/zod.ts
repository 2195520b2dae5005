import { z } from 'zod';
import { Redacted } from './redacted';

export const redacted = <T extends z.ZodType>(schema: T) =>
  schema.transform((value) => new Redacted(value));

/** Absolute http(s) URL; trailing slashes are dropped so paths can be appended verbatim. */
export const baseUrl = () =>
  z
    .url({ protocol: /^https?$/ })
    .transform((url) => url.replace(/\/+$/, ''));

export const positiveInt = () => z.coerce.number<string | undefined>().int().positive();
