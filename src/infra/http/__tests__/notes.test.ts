import { describe, it, expect, beforeEach } from 'vitest';
import request from 'supertest';
import express from 'express';
import { TokenService } from '../../../application/auth/tokenService.js';
import { PasswordHasher } from '../../../domain/auth/password.js';
import { InMemoryNoteRepo } from '../../memory/noteRepo.js';
import { InMemoryUserRepo } from '../../memory/userRepo.js';
import { createApp } from '../app.js';

describe('Notes API', () => {
  let app: express.Application;
  let now: Date;

  const tick = (ms = 1000) => {
    now = new Date(now.getTime() + ms);
  };

  async function signUp(username: string, email: string): Promise<string> {
    const registerRes = await request(app)
      .post('/api/auth/register')
      .send({ username, email, password: 'password123' });
    expect(registerRes.status).toBe(201);

    const loginRes = await request(app)
      .post('/api/auth/login')
      .send({ username, password: 'password123' });
    expect(loginRes.status).toBe(200);
    return `Bearer ${loginRes.body.access_token}`;
  }

  beforeEach(() => {
    now = new Date('2024-03-01T12:00:00Z');
    app = createApp({
      userRepo: new InMemoryUserRepo(),
      noteRepo: new InMemoryNoteRepo(),
      passwordHasher: new PasswordHasher({ timeCost: 2, memoryCost: 4096 }),
      tokenService: new TokenService({ secret: 'test-secret', ttlMinutes: 60 }),
      clock: () => now,
    });
  });

  it('runs the full register → login → CRUD flow', async () => {
    const auth = await signUp('alice', 'a@x.com');

    const created = await request(app)
      .post('/api/notes')
      .set('Authorization', auth)
      .send({ title: 'Shopping', content: 'milk' });
    expect(created.status).toBe(201);
    expect(created.body).toMatchObject({
      title: 'Shopping',
      content: 'milk',
      createdAt: '2024-03-01T12:00:00.000Z',
      updatedAt: '2024-03-01T12:00:00.000Z',
    });
    const noteId: string = created.body.id;

    const listed = await request(app).get('/api/notes').set('Authorization', auth);
    expect(listed.status).toBe(200);
    expect(listed.body).toEqual([created.body]);

    tick();
    const updated = await request(app)
      .patch(`/api/notes/${noteId}`)
      .set('Authorization', auth)
      .send({ content: 'milk, eggs' });
    expect(updated.status).toBe(200);

    const fetched = await request(app).get(`/api/notes/${noteId}`).set('Authorization', auth);
    expect(fetched.status).toBe(200);
    expect(fetched.body).toMatchObject({
      id: noteId,
      title: 'Shopping',
      content: 'milk, eggs',
      createdAt: '2024-03-01T12:00:00.000Z',
      updatedAt: '2024-03-01T12:00:01.000Z',
    });

    const deleted = await request(app).delete(`/api/notes/${noteId}`).set('Authorization', auth);
    expect(deleted.status).toBe(200);
    expect(deleted.body).toEqual({ deleted: true, id: noteId });

    const gone = await request(app).get(`/api/notes/${noteId}`).set('Authorization', auth);
    expect(gone.status).toBe(404);
    expect(gone.body).toEqual({ code: 'NOT_FOUND', message: 'Note not found' });
  });

  it('requires authentication on every notes route', async () => {
    const noteId = '00000000-0000-4000-8000-000000000000';
    const responses = await Promise.all([
      request(app).get('/api/notes'),
      request(app).post('/api/notes').send({ title: 'x' }),
      request(app).get(`/api/notes/${noteId}`),
      request(app).patch(`/api/notes/${noteId}`).send({ title: 'x' }),
      request(app).delete(`/api/notes/${noteId}`),
    ]);

    for (const response of responses) {
      expect(response.status).toBe(401);
      expect(response.headers['www-authenticate']).toBe('Bearer');
    }
  });

  describe('ownership', () => {
    let aliceAuth: string;
    let bobAuth: string;
    let aliceNoteId: string;

    beforeEach(async () => {
      aliceAuth = await signUp('alice', 'a@x.com');
      bobAuth = await signUp('bob', 'b@x.com');
      const res = await request(app)
        .post('/api/notes')
        .set('Authorization', aliceAuth)
        .send({ title: 'Private' });
      aliceNoteId = res.body.id;
    });

    it('hides another user’s note behind the same 404 as a missing one', async () => {
      const foreign = await request(app).get(`/api/notes/${aliceNoteId}`).set('Authorization', bobAuth);
      const missing = await request(app)
        .get('/api/notes/00000000-0000-4000-8000-000000000000')
        .set('Authorization', bobAuth);

      expect(foreign.status).toBe(404);
      expect(foreign.body).toEqual(missing.body);
    });

    it('does not let another user update or delete the note', async () => {
      const patch = await request(app)
        .patch(`/api/notes/${aliceNoteId}`)
        .set('Authorization', bobAuth)
        .send({ title: 'Mine now' });
      const del = await request(app).delete(`/api/notes/${aliceNoteId}`).set('Authorization', bobAuth);

      expect(patch.status).toBe(404);
      expect(del.status).toBe(404);

      const own = await request(app).get(`/api/notes/${aliceNoteId}`).set('Authorization', aliceAuth);
      expect(own.body).toHaveProperty('title', 'Private');
    });

    it('lists only the caller’s notes', async () => {
      const bobList = await request(app).get('/api/notes').set('Authorization', bobAuth);

      expect(bobList.status).toBe(200);
      expect(bobList.body).toEqual([]);
    });
  });

  describe('GET /api/notes query', () => {
    let auth: string;

    beforeEach(async () => {
      auth = await signUp('alice', 'a@x.com');
      for (const title of ['Banana', 'Team meeting notes', 'Apple', 'Cherry']) {
        await request(app).post('/api/notes').set('Authorization', auth).send({ title });
        tick();
      }
    });

    const titles = (body: { title: string }[]) => body.map((n) => n.title);

    it('searches titles case-insensitively', async () => {
      const res = await request(app)
        .get('/api/notes')
        .query({ search: 'Meeting' })
        .set('Authorization', auth);

      expect(res.status).toBe(200);
      expect(titles(res.body)).toEqual(['Team meeting notes']);
    });

    it('sorts by -title', async () => {
      const res = await request(app)
        .get('/api/notes')
        .query({ sort: '-title' })
        .set('Authorization', auth);

      expect(titles(res.body)).toEqual(['Team meeting notes', 'Cherry', 'Banana', 'Apple']);
    });

    it('defaults to newest first', async () => {
      const res = await request(app).get('/api/notes').set('Authorization', auth);

      expect(titles(res.body)).toEqual(['Cherry', 'Apple', 'Team meeting notes', 'Banana']);
    });

    it('applies limit', async () => {
      const res = await request(app)
        .get('/api/notes')
        .query({ sort: 'created', limit: '2' })
        .set('Authorization', auth);

      expect(titles(res.body)).toEqual(['Banana', 'Team meeting notes']);
    });

    it.each(['0', '101', 'ten'])('rejects limit=%s with INVALID_ARGUMENT', async (limit) => {
      const res = await request(app).get('/api/notes').query({ limit }).set('Authorization', auth);

      expect(res.status).toBe(400);
      expect(res.body).toMatchObject({ code: 'INVALID_ARGUMENT', details: { field: 'limit' } });
    });

    it('accepts limit=100', async () => {
      const res = await request(app).get('/api/notes').query({ limit: '100' }).set('Authorization', auth);

      expect(res.status).toBe(200);
      expect(res.body).toHaveLength(4);
    });

    it('rejects an unknown sort key', async () => {
      const res = await request(app)
        .get('/api/notes')
        .query({ sort: 'updated' })
        .set('Authorization', auth);

      expect(res.status).toBe(400);
      expect(res.body).toMatchObject({ code: 'INVALID_ARGUMENT', details: { field: 'sort' } });
    });
  });

  describe('input validation', () => {
    let auth: string;

    beforeEach(async () => {
      auth = await signUp('alice', 'a@x.com');
    });

    it('rejects a missing or overlong title', async () => {
      const missing = await request(app).post('/api/notes').set('Authorization', auth).send({ content: 'x' });
      const overlong = await request(app)
        .post('/api/notes')
        .set('Authorization', auth)
        .send({ title: 'x'.repeat(201) });

      expect(missing.status).toBe(400);
      expect(missing.body.details.issues[0].path).toBe('title');
      expect(overlong.status).toBe(400);
      expect(overlong.body.details.issues[0].path).toBe('title');
    });

    it('measures title length in characters', async () => {
      const accepted = await request(app)
        .post('/api/notes')
        .set('Authorization', auth)
        .send({ title: '😀'.repeat(200) });
      const rejected = await request(app)
        .post('/api/notes')
        .set('Authorization', auth)
        .send({ title: '😀'.repeat(201) });

      expect(accepted.status).toBe(201);
      expect(accepted.body.title).toBe('😀'.repeat(200));
      expect(rejected.status).toBe(400);
      expect(rejected.body.details.issues[0].path).toBe('title');
    });

    it('rejects an empty title on update', async () => {
      const created = await request(app).post('/api/notes').set('Authorization', auth).send({ title: 'Draft' });

      const res = await request(app)
        .patch(`/api/notes/${created.body.id}`)
        .set('Authorization', auth)
        .send({ title: '' });

      expect(res.status).toBe(400);
      expect(res.body).toHaveProperty('code', 'VALIDATION_ERROR');
    });

    it('rejects a note id that is not a uuid', async () => {
      const res = await request(app).get('/api/notes/42').set('Authorization', auth);

      expect(res.status).toBe(400);
      expect(res.body.details.issues[0].path).toBe('id');
    });

    it('rejects a malformed JSON body', async () => {
      const res = await request(app)
        .post('/api/notes')
        .set('Authorization', auth)
        .set('Content-Type', 'application/json')
        .send('{"title":');

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ code: 'VALIDATION_ERROR', message: 'Malformed JSON body' });
    });
  });
});
