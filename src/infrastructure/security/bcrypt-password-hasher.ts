import bcrypt from 'bcryptjs';
import { IPasswordHasherPort } from '@application/ports';

/**
 * bcrypt implementation of IPasswordHasherPort. The cost factor is embedded
 * in each hash, so changing BCRYPT_ROUNDS keeps old hashes verifiable.
 */
export class BcryptPasswordHasher implements IPasswordHasherPort {
  constructor(private readonly rounds: number) {}

  hash(plainText: string): Promise<string> {
    return bcrypt.hash(plainText, this.rounds);
  }

  verify(plainText: string, hash: string): Promise<boolean> {
    return bcrypt.compare(plainText, hash);
  }
}
