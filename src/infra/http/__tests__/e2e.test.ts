import { describe, it, expect } from 'vitest';
import request from 'supertest';
import { buildTestApp } from '../../../test/helpers.js';

describe('E2E: register, log in, manage users', () => {
  it('walks a user through registration, search and soft delete', async () => {
    const { app, userRepo } = buildTestApp();

    // 1. Register
    const registerRes = await request(app)
      .post('/api/register')
      .send({ name: 'Alice', email: 'a@x.com', password: 'secret123' });

    expect(registerRes.status).toBe(201);
    expect(registerRes.body).not.toHaveProperty('password');
    expect(registerRes.body).not.toHaveProperty('passwordHash');
    const userId: string = registerRes.body.id;

    // 2. Login
    const loginRes = await request(app)
      .post('/api/login')
      .send({ email: 'a@x.com', password: 'secret123' });

    expect(loginRes.status).toBe(200);
    const headers = { Authorization: `Bearer ${loginRes.body.token}` };

    // 3. List includes Alice
    const listRes = await request(app).get('/api/users').set(headers);
    expect(listRes.status).toBe(200);
    expect(listRes.body.data.map((u: { id: string }) => u.id)).toContain(userId);

    // 4. Search before delete
    const before = await request(app).get('/api/users/search?q=ali').set(headers);
    expect(before.body.count).toBe(1);

    // 5. Soft delete
    const deleteRes = await request(app).delete(`/api/users/${userId}`).set(headers);
    expect(deleteRes.status).toBe(200);

    // 6. Gone from get and search
    const getRes = await request(app).get(`/api/users/${userId}`).set(headers);
    expect(getRes.status).toBe(404);

    const after = await request(app).get('/api/users/search?q=ali').set(headers);
    expect(after.body).toEqual({ data: [], count: 0, query: 'ali' });

    // 7. The record still exists and can be restored
    expect(userRepo.all()).toHaveLength(1);
    const restoreRes = await request(app).post(`/api/users/${userId}/restore`).set(headers);
    expect(restoreRes.status).toBe(200);

    const again = await request(app).get('/api/users/search?q=ali').set(headers);
    expect(again.body.count).toBe(1);
  });
});
