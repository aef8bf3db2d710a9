import { eq } from 'drizzle-orm';
import request from 'supertest';

import { events, groups, pupils } from '../../../src/database/schema';
import { type TestApp, createTestApp } from '../helpers/test-app';
import { type Session, TestHelper } from '../helpers/test-helper';

describe('Users (e2e)', () => {
  let testApp: TestApp;
  let helper: TestHelper;
  let owner: Session;
  let other: Session;

  beforeAll(async () => {
    testApp = await createTestApp();
    helper = new TestHelper(testApp.app);
    owner = await helper.login('olga');
    other = await helper.login('oscar');
  });

  afterAll(async () => {
    await testApp.close();
  });

  describe('/api/users (POST)', () => {
    it('creates a user without authentication', async () => {
      const res = await request(helper.server)
        .post('/api/users')
        .send({
          googleUserId: 'google-walk-in',
          email: 'walk-in@example.com',
          fullName: 'Walk In',
          lastLoginAt: '2026-01-05T09:30:00+00:00',
        })
        .expect(201);

      expect(res.body.success).toBe(true);
      expect(res.body.data).toMatchObject({
        googleUserId: 'google-walk-in',
        email: 'walk-in@example.com',
        fullName: 'Walk In',
        profilePicUrl: null,
        lastLoginAt: '2026-01-05T09:30:00.000Z',
      });
      expect(res.body.data).not.toHaveProperty('refreshTokenHash');
    });

    it('rejects a duplicate email', async () => {
      const res = await request(helper.server)
        .post('/api/users')
        .send({ googleUserId: 'google-copy', email: 'olga@example.com', fullName: 'Copy' })
        .expect(409);

      expect(res.body.error).toEqual({
        title: 'Data conflict',
        message: 'Unique constraint violated: users_email_unique',
      });
    });

    it('rejects a malformed picture URL', async () => {
      const res = await request(helper.server)
        .post('/api/users')
        .send({
          googleUserId: 'google-pic',
          email: 'pic@example.com',
          fullName: 'Pic',
          profilePicUrl: 'not a url',
        })
        .expect(400);

      expect(res.body.error.message).toMatch(/^profilePicUrl: /);
    });
  });

  it('/api/users (GET) pages through users in id order', async () => {
    const res = await request(helper.server)
      .get('/api/users?skip=1&limit=1')
      .set(helper.auth(owner))
      .expect(200);

    expect(res.body.data).toHaveLength(1);
    expect(res.body.data[0].id).toBe(other.userId);
  });

  it('/api/users/:id (GET) returns 404 for an unknown user', async () => {
    const res = await request(helper.server)
      .get('/api/users/999999')
      .set(helper.auth(owner))
      .expect(404);

    expect(res.body.error).toEqual({ title: 'Resource not found', message: 'User not found' });
  });

  it('/api/users/:id (PATCH) refuses to edit another user', async () => {
    const res = await request(helper.server)
      .patch(`/api/users/${other.userId}`)
      .set(helper.auth(owner))
      .send({ fullName: 'Hijacked' })
      .expect(403);

    expect(res.body.error).toEqual({
      title: 'Access denied',
      message: 'Not authorized to update this user',
    });
  });

  it('/api/users/:id (PATCH) edits the current user', async () => {
    const res = await request(helper.server)
      .patch(`/api/users/${owner.userId}`)
      .set(helper.auth(owner))
      .send({ fullName: 'Olga Renamed', profilePicUrl: 'https://example.com/olga.png' })
      .expect(200);

    expect(res.body.data).toMatchObject({
      id: owner.userId,
      fullName: 'Olga Renamed',
      profilePicUrl: 'https://example.com/olga.png',
      email: 'olga@example.com',
    });
  });

  it('/api/users/:id (DELETE) refuses to delete another user', async () => {
    const res = await request(helper.server)
      .delete(`/api/users/${owner.userId}`)
      .set(helper.auth(other))
      .expect(403);

    expect(res.body.error.message).toBe('Not authorized to delete this user');
  });

  it('/api/users/:id (DELETE) deletes the current user', async () => {
    await request(helper.server)
      .delete(`/api/users/${other.userId}`)
      .set(helper.auth(other))
      .expect(204);

    await request(helper.server)
      .get(`/api/users/${other.userId}`)
      .set(helper.auth(owner))
      .expect(404);
  });

  it('/api/users/:id (DELETE) removes the pupils, groups and events of the user', async () => {
    const leaving = await helper.login('uma');
    await helper.createPupil(leaving);
    await helper.createGroup(leaving, 'Evening class');
    await helper.createEvent(leaving, {
      eventType: 'once',
      startTime: '2026-05-04T10:00:00Z',
      endTime: '2026-05-04T11:00:00Z',
    });

    await request(helper.server)
      .delete(`/api/users/${leaving.userId}`)
      .set(helper.auth(leaving))
      .expect(204);

    const { db } = testApp;
    expect(await db.select().from(pupils).where(eq(pupils.ownerId, leaving.userId))).toEqual([]);
    expect(await db.select().from(groups).where(eq(groups.ownerId, leaving.userId))).toEqual([]);
    expect(await db.select().from(events).where(eq(events.ownerId, leaving.userId))).toEqual([]);
  });
});
