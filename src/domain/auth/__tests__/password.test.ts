import { describe, it, expect } from 'vitest';
import { PasswordHasher } from '../password.js';

describe('PasswordHasher', () => {
  const hasher = new PasswordHasher({ timeCost: 2, memoryCost: 4096 });

  it('produces a salted argon2id hash that is not the plaintext', async () => {
    const first = await hasher.hash('password123');
    const second = await hasher.hash('password123');

    expect(first).not.toBe('password123');
    expect(first.startsWith('$argon2id$')).toBe(true);
    expect(first).not.toBe(second);
  });

  it('verifies the matching password', async () => {
    const hash = await hasher.hash('password123');

    await expect(hasher.verify('password123', hash)).resolves.toBe(true);
  });

  it('rejects a different password', async () => {
    const hash = await hasher.hash('password123');

    await expect(hasher.verify('password124', hash)).resolves.toBe(false);
  });

  it('treats a malformed stored hash as a failed verification', async () => {
    await expect(hasher.verify('password123', 'not-a-hash')).resolves.toBe(false);
  });
});
