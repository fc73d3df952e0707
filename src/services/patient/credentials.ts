import bcrypt from 'bcrypt';
import { NOT_AVAILABLE } from '../../domain/types.js';

export interface PasswordHasher {
  hash(password: string): Promise<string>;
  verify(password: string, hash: string): Promise<boolean>;
}

export function createBcryptHasher(rounds: number): PasswordHasher {
  return {
    hash: (password) => bcrypt.hash(password, rounds),
    verify: (password, hash) => bcrypt.compare(password, hash),
  };
}

/** Initial password of an account created from a consent form: "<first name>123!". */
export function defaultPasswordFor(patientName: string): string {
  const firstWord = patientName.trim().split(/\s+/)[0] ?? '';
  if (patientName === NOT_AVAILABLE || firstWord === '') return 'patient123!';
  return `${firstWord.toLowerCase()}123!`;
}
