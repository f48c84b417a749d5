import { randomBytes, scrypt, timingSafeEqual } from 'node:crypto';
import { InvalidCredentialsError } from '@campus-id/domain';
import { PasswordHasher } from '../../application/ports/password-hasher';

const KEY_LENGTH = 64;
const SALT_LENGTH = 16;
const BLOCK_SIZE = 8;
const PREFIX = 'scrypt';

const derive = (plain: string, salt: Buffer, logN: number): Promise<Buffer> =>
  new Promise((resolve, reject) => {
    const N = 2 ** logN;
    scrypt(
      plain,
      salt,
      KEY_LENGTH,
      { N, r: BLOCK_SIZE, p: 1, maxmem: 256 * N * BLOCK_SIZE },
      (error, key) => (error ? reject(error) : resolve(key))
    );
  });

type ParsedHash = { logN: number; salt: Buffer; key: Buffer };

const parse = (encoded: string): ParsedHash | null => {
  const [prefix, cost, salt, key, ...rest] = encoded.split('$');
  if (prefix !== PREFIX || !cost || !salt || !key || rest.length > 0) {
    return null;
  }
  const logN = Number(cost);
  if (!Number.isInteger(logN) || logN < 1 || logN > 30) {
    return null;
  }
  return {
    logN,
    salt: Buffer.from(salt, 'base64'),
    key: Buffer.from(key, 'base64'),
  };
};

/**
 * Hashes as `scrypt$<logN>$<salt b64>$<hash b64>`. The cost is stored with
 * each hash, so raising it later keeps older hashes verifiable. A stored
 * cost above the hasher's own is rejected before any key is derived.
 */
export class ScryptPasswordHasher extends PasswordHasher {
  constructor(private readonly logN: number) {
    super();
  }

  async hash(plain: string): Promise<string> {
    const salt = randomBytes(SALT_LENGTH);
    const key = await derive(plain, salt, this.logN);
    return [
      PREFIX,
      String(this.logN),
      salt.toString('base64'),
      key.toString('base64'),
    ].join('$');
  }

  async compare(hash: string, plain: string): Promise<void> {
    const parsed = parse(hash);
    if (
      !parsed ||
      parsed.key.length !== KEY_LENGTH ||
      parsed.logN > this.logN
    ) {
      throw new InvalidCredentialsError();
    }
    const candidate = await derive(plain, parsed.salt, parsed.logN);
    if (!timingSafeEqual(candidate, parsed.key)) {
      throw new InvalidCredentialsError();
    }
  }
}
