import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  InvalidCredentialsError,
  normalizeEmail,
  type UserRole,
} from '@campus-id/domain';
import { PasswordHasher } from '@platform/application/ports/password-hasher';
import { TransactionRunner } from '@platform/application/ports/transaction-runner';
import { redactEmail } from '@platform/logging/redact';
import { UserDirectory, type UserLookup } from './ports/user-directory';

export type CredentialsInput = Readonly<{
  login: string;
  password: string;
}>;

export type AuthenticatedUser = Readonly<{
  userId: string;
  barcode: string;
  role: UserRole;
}>;

const lookupFor = (login: string): UserLookup =>
  login.includes('@')
    ? { email: normalizeEmail(login) }
    : { barcode: login.trim() };

const describeLookup = (lookup: UserLookup): string => {
  if ('email' in lookup) return redactEmail(lookup.email);
  if ('barcode' in lookup) return `barcode ${lookup.barcode}`;
  return lookup.id.value;
};

/**
 * Checks a login (email or barcode) and password against the stored hash.
 * Issuing a session for the result is left to the gateway.
 */
@Injectable()
export class CredentialService<Tx = unknown> {
  private readonly logger = new Logger(CredentialService.name);

  constructor(
    @Inject(TransactionRunner) private readonly runner: TransactionRunner<Tx>,
    @Inject(UserDirectory) private readonly users: UserDirectory<Tx>,
    @Inject(PasswordHasher) private readonly hasher: PasswordHasher
  ) {}

  /**
   * An unknown login and a wrong password fail alike, with
   * `InvalidCredentialsError`.
   */
  async verify(
    input: CredentialsInput,
    signal?: AbortSignal
  ): Promise<AuthenticatedUser> {
    const lookup = lookupFor(input.login);
    const profile = await this.runner.run(
      (tx) => this.users.findProfile(tx, lookup),
      { signal }
    );
    if (!profile) {
      this.logger.warn(`Login rejected: no user for ${describeLookup(lookup)}`);
      throw new InvalidCredentialsError();
    }

    try {
      await this.hasher.compare(profile.passwordHash, input.password);
    } catch (error) {
      this.logger.warn(`Login rejected for user ${profile.id.value}`);
      throw error;
    }

    this.logger.log(`User ${profile.id.value} authenticated`);
    return {
      userId: profile.id.value,
      barcode: profile.barcode,
      role: profile.role,
    };
  }
}
