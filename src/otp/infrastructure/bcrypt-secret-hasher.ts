import { Injectable } from '@nestjs/common';
import * as bcrypt from 'bcryptjs';
import { SecretHasher } from '../domain/secret-hasher';

const SALT_ROUNDS = 10;

@Injectable()
export class BcryptSecretHasher implements SecretHasher {
  async hash(plaintext: string): Promise<string> {
    return bcrypt.hash(plaintext, SALT_ROUNDS);
  }

  async verify(plaintext: string, digest: string): Promise<boolean> {
    return bcrypt.compare(plaintext, digest);
  }
}
