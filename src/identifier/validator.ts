import { z } from 'zod';

export const MAX_IDENTIFIER_LENGTH = 2048;

// Whitespace and control characters are legal in neither URIs nor IRIs,
// but the WHATWG parser behind z.string().url() would percent-encode them.
const FORBIDDEN_CHARS = /[\s\u0000-\u001f\u007f-\u009f<>"{}|\\^`]/u;
const SCHEME = /^[a-z][a-z0-9+.-]*:/i;

const identifierSchema = z
  .string()
  .min(1)
  .max(MAX_IDENTIFIER_LENGTH)
  .refine((value) => !FORBIDDEN_CHARS.test(value), { message: 'identifier contains forbidden characters' })
  .refine((value) => SCHEME.test(value), { message: 'identifier has no scheme' })
  .pipe(z.string().url());

export type IdentifierValidator = (value: string) => boolean;

/** Whether `value` is an absolute resource identifier (RFC 3987 IRI). */
export const isValidIdentifier: IdentifierValidator = (value) => identifierSchema.safeParse(value).success;

export function describeInvalidIdentifier(value: string): string {
  const result = identifierSchema.safeParse(value);
  if (result.success) {
    return 'identifier is valid';
  }
  return result.error.issues[0]?.message ?? 'invalid identifier';
}
