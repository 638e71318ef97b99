import bcrypt from 'bcryptjs';
import { ConflictError } from '../middleware/errorHandler';
import { Store } from '../models/store';
import { User } from '../types';

export interface CredentialServiceOptions {
  bcryptRounds: number;
}

export type CredentialService = ReturnType<typeof createCredentialService>;

/**
 * Username → (email, bcrypt hash). Plaintext passwords never reach the store.
 */
export function createCredentialService(store: Store, options: CredentialServiceOptions) {
  // Usernames whose hash is still being computed.
  const pending = new Set<string>();

  return {
    async register(username: string, email: string, password: string): Promise<User> {
      if (store.users.has(username) || pending.has(username)) {
        throw new ConflictError('Username already registered');
      }

      pending.add(username);
      try {
        const passwordHash = await bcrypt.hash(password, options.bcryptRounds);
        store.users.set(username, { username, email, passwordHash });
      } finally {
        pending.delete(username);
      }

      return { username, email };
    },

    async verify(username: string, password: string): Promise<boolean> {
      const user = store.users.get(username);
      if (!user) return false;
      return bcrypt.compare(password, user.passwordHash);
    },

    exists(username: string): boolean {
      return store.users.has(username);
    },
  };
}
