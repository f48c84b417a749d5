export abstract class PasswordHasher {
  abstract hash(plain: string): Promise<string>;

  /** Resolves when `plain` matches; throws `InvalidCredentialsError` otherwise. */
  abstract compare(hash: string, plain: string): Promise<void>;
}
