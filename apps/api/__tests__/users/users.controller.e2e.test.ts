import type { INestApplication } from '@nestjs/common';
import request from 'supertest';
import type { UserId } from '@campus-id/domain';
import {
  GROUP_ID,
  STRONG_PASSWORD,
  createHarness,
  type Harness,
} from '../support/harness';
import { createHttpApp } from '../support/http-app';
import { seedStaff, seedStudent } from '../support/users';

describe('Auth and student routes (e2e, in-memory)', () => {
  let harness: Harness;
  let app: INestApplication;
  let studentId: UserId;

  beforeEach(async () => {
    harness = createHarness();
    studentId = await seedStudent(harness, {
      email: 'ada@example.com',
      barcode: 'STU202401',
    });
    app = await createHttpApp(harness);
  });

  afterEach(async () => {
    await app.close();
  });

  describe('POST /auth/login', () => {
    it('answers 200 with the authenticated user', async () => {
      const response = await request(app.getHttpServer())
        .post('/auth/login')
        .send({ login: 'ada@example.com', password: STRONG_PASSWORD });

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        userId: studentId.value,
        barcode: 'STU202401',
        role: 'student',
      });
    });

    it('answers 401 for a wrong password', async () => {
      const response = await request(app.getHttpServer())
        .post('/auth/login')
        .send({ login: 'STU202401', password: 'Wrong0ne!' });

      expect(response.status).toBe(401);
      expect(response.body).toEqual({
        code: 'INVALID_CREDENTIALS',
        message: 'Invalid credentials',
      });
    });

    it('answers 400 without a login', async () => {
      const response = await request(app.getHttpServer())
        .post('/auth/login')
        .send({ password: STRONG_PASSWORD });

      expect(response.status).toBe(400);
      expect(response.body).toMatchObject({
        code: 'VALIDATION_FAILED',
        fields: [{ field: 'login' }],
      });
    });
  });

  describe('GET /students/:id', () => {
    it('requires a caller id', async () => {
      const response = await request(app.getHttpServer()).get(
        `/students/${studentId.value}`
      );

      expect(response.status).toBe(401);
    });

    it('returns the caller their own record at /students/me', async () => {
      const response = await request(app.getHttpServer())
        .get('/students/me')
        .set('x-user-id', studentId.value);

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        id: studentId.value,
        barcode: 'STU202401',
        email: 'ada@example.com',
        firstName: 'Ada',
        lastName: 'Lovelace',
        groupId: GROUP_ID,
        role: 'student',
        registeredAt: '2026-01-15T09:00:00.000Z',
      });
    });

    it('lets staff read a student', async () => {
      const staffId = await seedStaff(harness, {
        email: 'staff@example.com',
        barcode: 'STF000001',
        username: 'jdoe',
      });

      const response = await request(app.getHttpServer())
        .get(`/students/${studentId.value}`)
        .set('x-user-id', staffId.value);

      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({ id: studentId.value });
    });

    it('answers 403 to another student', async () => {
      const otherId = await seedStudent(harness, {
        email: 'grace@example.com',
        barcode: 'STU202402',
      });

      const response = await request(app.getHttpServer())
        .get(`/students/${studentId.value}`)
        .set('x-user-id', otherId.value);

      expect(response.status).toBe(403);
      expect(response.body).toMatchObject({ code: 'FORBIDDEN' });
    });

    it('answers 400 for a malformed id', async () => {
      const response = await request(app.getHttpServer())
        .get('/students/not-a-uuid')
        .set('x-user-id', studentId.value);

      expect(response.status).toBe(400);
      expect(response.body).toEqual({
        code: 'VALIDATION_FAILED',
        message: 'userId: must be a valid UUID',
        fields: [{ field: 'userId', message: 'must be a valid UUID' }],
      });
    });
  });
});
