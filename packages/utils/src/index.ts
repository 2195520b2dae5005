export { normalizeError, type SerializedError, sanitizeError } from './normalize-error';
export { Redacted } from './redacted';
export { concealDiagnostic, LogsDiagnosticDataPolicy, smear } from './smear';
export { elapsedMilliseconds } from './timing';
export { baseUrl, positiveInt, redacted } from './zod';
