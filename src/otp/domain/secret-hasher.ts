export interface SecretHasher {
  hash(plaintext: string): Promise<string>;
  verify(plaintext: string, digest: string): Promise<boolean>;
}

export const SECRET_HASHER = 'SECRET_HASHER';
