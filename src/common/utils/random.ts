import { randomInt } from 'crypto';

export const TICKET_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';

export function randomString(length: number, alphabet: string = TICKET_ALPHABET): string {
  let result = '';
  for (let i = 0; i < length; i++) {
    result += alphabet[randomInt(0, alphabet.length)];
  }
  return result;
}

/**
 * Fisher–Yates over a copy; every permutation is equally likely.
 */
export function shuffle<T>(items: readonly T[]): T[] {
  const copy = [...items];
  for (let i = copy.length - 1; i > 0; i--) {
    const j = randomInt(0, i + 1);
    [copy[i], copy[j]] = [copy[j], copy[i]];
  }
  return copy;
}
