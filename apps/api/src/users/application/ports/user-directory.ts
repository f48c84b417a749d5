import type { UserId, UserProfile } from '@campus-id/domain';

export type UserIdentityField = 'email' | 'barcode' | 'username';

export type UserIdentityCandidate = Readonly<{
  email: string;
  barcode?: string;
  username?: string;
}>;

export type UserLookup =
  | Readonly<{ id: UserId }>
  | Readonly<{ email: string }>
  | Readonly<{ barcode: string }>;

/**
 * Uniqueness and identity lookups across every user, whatever the role.
 */
export abstract class UserDirectory<Tx> {
  /**
   * The first of email, barcode, username (in that order) that an existing
   * user already holds, or null.
   */
  abstract findConflict(
    tx: Tx,
    candidate: UserIdentityCandidate
  ): Promise<UserIdentityField | null>;

  abstract findProfile(
    tx: Tx,
    lookup: UserLookup
  ): Promise<UserProfile | null>;
}
