export const LogsDiagnosticDataPolicy = {
  CONCEAL: 'conceal',
  DISCLOSE: 'disclose',
} as const;

export type LogsDiagnosticDataPolicy =
  (typeof LogsDiagnosticDataPolicy)[keyof typeof LogsDiagnosticDataPolicy];

/**
 * Masks word characters of `text`, keeping the last `visibleTail` characters readable.
 * Good for diagnostics such as token tails or request paths; secrets belong in `Redacted`.
 *
 * Returns `"__erroneous__"` for nullish input and `"[Smeared]"` when fewer than three
 * characters would be masked.
 *
 * @example
 * smear('eyJhbGciOi.abc.sig-1234'); // "**********.***.***-1234"
 * smear('ab');                      // "[Smeared]"
 */
export function smear(text: string | null | undefined, visibleTail = 4): string {
  if (text === undefined || text === null) {
    return '__erroneous__';
  }

  const hiddenLength = text.length - visibleTail;
  if (hiddenLength < 3) return '[Smeared]';

  return `${text.slice(0, hiddenLength).replace(/\w/g, '*')}${text.slice(hiddenLength)}`;
}

export function concealDiagnostic(text: string, policy: LogsDiagnosticDataPolicy): string {
  return policy === LogsDiagnosticDataPolicy.DISCLOSE ? text : smear(text);
}
