import { describe, it, expect, beforeAll, afterAll, afterEach } from 'vitest';
import { ConflictError } from '../../../application/errors.js';
import { parseNoteListQuery } from '../../../domain/notes/note.js';
import { migrate } from '../migrate.js';
import { PgNoteRepo } from '../noteRepo.js';
import { DbPool, createPool } from '../pool.js';
import { PgUserRepo } from '../userRepo.js';

const databaseUrl = process.env.DATABASE_URL;
const describeDb = databaseUrl ? describe : describe.skip;

describeDb('Postgres repositories', () => {
  let pool: DbPool;
  let userRepo: PgUserRepo;
  let noteRepo: PgNoteRepo;
  const suffix = `${Date.now()}-${Math.random().toString(16).slice(2)}`;
  const createdAt = new Date('2024-03-01T12:00:00Z');

  beforeAll(async () => {
    pool = createPool(databaseUrl ?? '');
    await migrate(pool);
    userRepo = new PgUserRepo(pool);
    noteRepo = new PgNoteRepo(pool);
  });

  afterEach(async () => {
    await pool.query(
      "DELETE FROM notes WHERE owner_id IN (SELECT id FROM users WHERE username LIKE 'vitest-%')"
    );
    await pool.query("DELETE FROM users WHERE username LIKE 'vitest-%'");
  });

  afterAll(async () => {
    await pool.end();
  });

  const newUser = (label: string) => ({
    username: `vitest-${label}-${suffix}`,
    email: `vitest-${label}-${suffix}@example.com`,
    passwordHash: 'hash',
    createdAt,
  });

  it('maps a unique violation on insert to ConflictError', async () => {
    const user = newUser('dup');
    await userRepo.create(user);

    await expect(userRepo.create({ ...user, email: `other-${suffix}@example.com` })).rejects.toThrow(
      ConflictError
    );
  });

  it('finds a user by username or email in one lookup', async () => {
    const created = await userRepo.create(newUser('lookup'));

    await expect(userRepo.findByUsernameOrEmail('nobody', created.email)).resolves.toEqual(created);
    await expect(userRepo.findByUsername(created.username)).resolves.toEqual(created);
  });

  it('scopes note reads, updates and deletes by owner', async () => {
    const alice = await userRepo.create(newUser('alice'));
    const bob = await userRepo.create(newUser('bob'));
    const note = await noteRepo.create({ ownerId: alice.id, title: 'Shopping', content: 'milk', createdAt });

    expect(note.updatedAt).toEqual(createdAt);
    await expect(noteRepo.findByIdForOwner(note.id, bob.id)).resolves.toBeNull();
    await expect(
      noteRepo.update(note.id, bob.id, { title: 'Hijacked' }, new Date('2024-03-01T12:00:01Z'))
    ).resolves.toBeNull();
    await expect(noteRepo.delete(note.id, bob.id)).resolves.toBe(false);

    const updated = await noteRepo.update(
      note.id,
      alice.id,
      { content: 'milk, eggs' },
      new Date('2024-03-01T12:00:01Z')
    );
    expect(updated).toMatchObject({ title: 'Shopping', content: 'milk, eggs', createdAt });
    expect(updated?.updatedAt).toEqual(new Date('2024-03-01T12:00:01Z'));

    await expect(noteRepo.delete(note.id, alice.id)).resolves.toBe(true);
    await expect(noteRepo.findByIdForOwner(note.id, alice.id)).resolves.toBeNull();
  });

  it('filters, sorts and limits listings', async () => {
    const alice = await userRepo.create(newUser('lister'));
    for (const title of ['Banana', 'Team meeting notes', 'Apple', 'Cherry', '100% done']) {
      await noteRepo.create({ ownerId: alice.id, title, content: null, createdAt });
    }

    const byTitle = await noteRepo.listByOwner(alice.id, parseNoteListQuery({ sort: '-title', limit: 3 }));
    expect(byTitle.map((n) => n.title)).toEqual(['Team meeting notes', 'Cherry', 'Banana']);

    const search = await noteRepo.listByOwner(alice.id, parseNoteListQuery({ search: 'MEETING' }));
    expect(search.map((n) => n.title)).toEqual(['Team meeting notes']);

    const literal = await noteRepo.listByOwner(alice.id, parseNoteListQuery({ search: '%' }));
    expect(literal.map((n) => n.title)).toEqual(['100% done']);
  });
});
