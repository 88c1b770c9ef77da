import { z } from 'zod';

/**
 * Validation schemas for encryption input
 */

/**
 * Blank means only characters at or below U+0020 (space and ASCII controls).
 * Unicode spaces such as U+00A0 count as content.
 */
export function isBlank(value: string): boolean {
  for (let i = 0; i < value.length; i++) {
    if (value.charCodeAt(i) > 0x20) {
      return false;
    }
  }
  return true;
}

// Refined rather than trimmed: the card number is sealed exactly as given
export const NonBlankStringSchema = z
  .string({ required_error: 'is required', invalid_type_error: 'must be a string' })
  .refine(value => !isBlank(value), { message: 'cannot be blank' });

export const EncryptionRequestSchema = z.object({
  rsaPublicKeyHex: NonBlankStringSchema,
  cardNumber: NonBlankStringSchema
});

/**
 * Describe the first problem with an encryption request, or null if it is valid
 */
export function describeRequestProblem(request: unknown): string | null {
  if (request == null) {
    return 'Request cannot be null';
  }

  const result = EncryptionRequestSchema.safeParse(request);
  if (result.success) {
    return null;
  }

  const issue = result.error.issues[0];
  if (!issue) {
    return 'Request is invalid';
  }
  const field = issue.path.join('.') || 'request';
  return `${field} ${issue.message}`;
}
