import { z } from 'zod';
import { ValidationError } from '../shared/errors';
import {
  barcodeSchema,
  emailSchema,
  normalizeEmail,
  personNameSchema,
  toFieldErrors,
  usernameSchema,
} from '../shared/validation';
import { Timestamp } from '../shared/vos/Timestamp';
import { UserId } from './UserId';

export type UserRole = 'student' | 'staff';

/**
 * Account data common to every kind of user.
 */
export type UserProfile = Readonly<{
  id: UserId;
  barcode: string;
  username: string;
  email: string;
  firstName: string;
  lastName: string;
  passwordHash: string;
  role: UserRole;
  createdAt: Timestamp;
  updatedAt: Timestamp;
}>;

const profileSchema = z.object({
  barcode: barcodeSchema,
  username: usernameSchema,
  email: emailSchema,
  firstName: personNameSchema,
  lastName: personNameSchema,
  passwordHash: z.string().min(1, 'is required'),
});

const studentProfileSchema = profileSchema.omit({ username: true });

export type NewUserProfileInput = Readonly<{
  barcode: string;
  username: string;
  email: string;
  firstName: string;
  lastName: string;
  passwordHash: string;
}>;

/**
 * Validates and normalizes a new user profile. Students sign in with
 * their barcode, so their username is not checked against the username
 * rules.
 */
export function newUserProfile(
  role: UserRole,
  input: NewUserProfileInput,
  registeredAt: Timestamp
): UserProfile {
  const candidate = { ...input, email: normalizeEmail(input.email) };
  const result =
    role === 'student'
      ? studentProfileSchema.safeParse(candidate)
      : profileSchema.safeParse(candidate);
  if (!result.success) {
    throw new ValidationError(toFieldErrors(result.error.issues, 'profile'));
  }
  return Object.freeze({
    id: UserId.create(),
    ...candidate,
    role,
    createdAt: registeredAt,
    updatedAt: registeredAt,
  });
}
