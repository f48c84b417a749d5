import { z } from 'zod';
import { ValidationError, type FieldError } from './errors';

export const MAX_EMAIL_LENGTH = 254;

const EMAIL_REGEX = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;
const PERSON_NAME_REGEX = /^[\p{L}\p{M}\s'\-.]+$/u;
const BARCODE_REGEX = /^[A-Z0-9]{6,20}$/;
const USERNAME_REGEX = /^[a-zA-Z][a-zA-Z0-9]*(?:[._][a-zA-Z0-9]+)*$/;

export const emailSchema = z
  .string()
  .min(1, 'is required')
  .max(MAX_EMAIL_LENGTH, `must be at most ${MAX_EMAIL_LENGTH} characters`)
  .regex(EMAIL_REGEX, 'must be a valid email address');

export const personNameSchema = z
  .string()
  .min(1, 'is required')
  .max(100, 'must be at most 100 characters')
  .regex(PERSON_NAME_REGEX, 'must be a valid name');

export const barcodeSchema = z
  .string()
  .min(1, 'is required')
  .regex(BARCODE_REGEX, 'must be 6 to 20 uppercase letters or digits');

export const usernameSchema = z
  .string()
  .min(3, 'must be at least 3 characters')
  .max(30, 'must be at most 30 characters')
  .regex(
    USERNAME_REGEX,
    'must start with a letter and use single periods or underscores between letters and digits'
  );

export const passwordSchema = z
  .string()
  .min(8, 'must be at least 8 characters')
  .max(72, 'must be at most 72 characters')
  .regex(/[A-Z]/, 'must contain an uppercase letter')
  .regex(/[a-z]/, 'must contain a lowercase letter')
  .regex(/[0-9]/, 'must contain a digit')
  .regex(/[^A-Za-z0-9]/, 'must contain a special character');

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

/**
 * Turns zod issues into field errors, keeping the first issue reported for
 * each dotted path. Root-level issues are reported under `fallbackField`.
 */
export function toFieldErrors(
  issues: ReadonlyArray<z.ZodIssue>,
  fallbackField: string
): FieldError[] {
  const seen = new Set<string>();
  const errors: FieldError[] = [];
  for (const issue of issues) {
    const field = issue.path.length > 0 ? issue.path.join('.') : fallbackField;
    if (seen.has(field)) continue;
    seen.add(field);
    errors.push({ field, message: issue.message });
  }
  return errors;
}

/**
 * Parses `input` with `schema`, throwing a `ValidationError` on failure.
 */
export function validateFields<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  fallbackField = 'input'
): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(toFieldErrors(result.error.issues, fallbackField));
  }
  return result.data;
}

export const MAX_INVITATION_RECIPIENTS = 25;

export const recipientsSchema = z
  .array(emailSchema)
  .max(
    MAX_INVITATION_RECIPIENTS,
    `must contain at most ${MAX_INVITATION_RECIPIENTS} emails`
  )
  .superRefine((emails, ctx) => {
    const seen = new Set<string>();
    emails.forEach((email, index) => {
      if (seen.has(email)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index],
          message: 'must not contain duplicate entries',
        });
      }
      seen.add(email);
    });
  });
