import type { INestApplication } from '@nestjs/common';
import request from 'supertest';
import { STRONG_PASSWORD, createHarness, type Harness } from '../support/harness';
import { createHttpApp } from '../support/http-app';

const CREATOR = '5b9d1f0e-2c4a-4e8b-9f3d-7a6c5e4b3a21';
const STRANGER = '0c1d2e3f-4a5b-4c6d-8e7f-9a0b1c2d3e4f';

describe('StaffInvitationController (e2e, in-memory)', () => {
  let harness: Harness;
  let app: INestApplication;

  beforeEach(async () => {
    harness = createHarness();
    app = await createHttpApp(harness);
  });

  afterEach(async () => {
    await app.close();
  });

  const createInvitation = (body: object = { recipientsEmail: ['One@Example.com'] }) =>
    request(app.getHttpServer())
      .post('/staff/invitations')
      .set('x-user-id', CREATOR)
      .send(body);

  it('requires a caller id', async () => {
    const response = await request(app.getHttpServer())
      .post('/staff/invitations')
      .send({ recipientsEmail: ['one@example.com'] });

    expect(response.status).toBe(401);
    expect(response.body).toEqual({
      statusCode: 401,
      message: 'A valid x-user-id header is required',
      error: 'Unauthorized',
    });
  });

  it('creates an invitation with 201', async () => {
    const response = await createInvitation({
      recipientsEmail: ['One@Example.com'],
      validUntil: '2026-01-15T10:00:00.000Z',
    });

    expect(response.status).toBe(201);
    expect(response.body).toMatchObject({
      creatorId: CREATOR,
      recipientsEmail: ['one@example.com'],
      validFrom: null,
      validUntil: '2026-01-15T10:00:00.000Z',
      createdAt: '2026-01-15T09:00:00.000Z',
    });
  });

  it('rejects a non-ISO validity bound', async () => {
    const response = await createInvitation({
      recipientsEmail: ['one@example.com'],
      validFrom: 'tomorrow',
    });

    expect(response.status).toBe(400);
    expect(response.body).toMatchObject({
      code: 'VALIDATION_FAILED',
      fields: [{ field: 'validFrom' }],
    });
  });

  it('hides an invitation from other callers', async () => {
    const { body } = await createInvitation();

    const response = await request(app.getHttpServer())
      .get(`/staff/invitations/${body.id}`)
      .set('x-user-id', STRANGER);

    expect(response.status).toBe(403);
    expect(response.body).toMatchObject({ code: 'FORBIDDEN' });
  });

  it('rejects a malformed invitation id', async () => {
    const response = await request(app.getHttpServer())
      .get('/staff/invitations/not-a-uuid')
      .set('x-user-id', CREATOR);

    expect(response.status).toBe(400);
    expect(response.body).toEqual({
      code: 'VALIDATION_FAILED',
      message: 'staffInvitationId: must be a valid UUID',
      fields: [{ field: 'staffInvitationId', message: 'must be a valid UUID' }],
    });
  });

  it('updates recipients and validity', async () => {
    const { body } = await createInvitation();

    const recipients = await request(app.getHttpServer())
      .patch(`/staff/invitations/${body.id}/recipients`)
      .set('x-user-id', CREATOR)
      .send({ recipientsEmail: ['one@example.com', 'two@example.com'] });
    const validity = await request(app.getHttpServer())
      .patch(`/staff/invitations/${body.id}/validity`)
      .set('x-user-id', CREATOR)
      .send({
        validFrom: '2026-01-15T10:00:00.000Z',
        validUntil: '2026-01-15T11:00:00.000Z',
      });

    expect(recipients.status).toBe(200);
    expect(recipients.body.recipientsEmail).toEqual([
      'one@example.com',
      'two@example.com',
    ]);
    expect(validity.status).toBe(200);
    expect(validity.body).toMatchObject({
      validFrom: '2026-01-15T10:00:00.000Z',
      validUntil: '2026-01-15T11:00:00.000Z',
    });
  });

  it('deletes with 204 and then reports not found', async () => {
    const { body } = await createInvitation();

    const deleted = await request(app.getHttpServer())
      .delete(`/staff/invitations/${body.id}`)
      .set('x-user-id', CREATOR);
    const fetched = await request(app.getHttpServer())
      .get(`/staff/invitations/${body.id}`)
      .set('x-user-id', CREATOR);

    expect(deleted.status).toBe(204);
    expect(fetched.status).toBe(404);
    expect(fetched.body).toMatchObject({ code: 'NOT_FOUND' });
  });

  it('accepts an invitation without a caller id', async () => {
    const { body } = await createInvitation();

    const response = await request(app.getHttpServer())
      .post(`/staff/invitations/${body.code}/accept`)
      .send({
        email: 'one@example.com',
        barcode: 'STF000001',
        username: 'jdoe',
        firstName: 'Jane',
        lastName: 'Doe',
        password: STRONG_PASSWORD,
      });

    expect(response.status).toBe(201);
    expect(response.body.userId).toMatch(/^[0-9a-f-]{36}$/);
    expect(harness.db.tables.staff).toHaveLength(1);
  });

  it('answers a taken username with the conflicting field', async () => {
    const { body } = await createInvitation({
      recipientsEmail: ['one@example.com', 'two@example.com'],
    });
    const accept = (email: string, barcode: string) =>
      request(app.getHttpServer())
        .post(`/staff/invitations/${body.code}/accept`)
        .send({
          email,
          barcode,
          username: 'jdoe',
          firstName: 'Jane',
          lastName: 'Doe',
          password: STRONG_PASSWORD,
        });

    await accept('one@example.com', 'STF000001');
    const response = await accept('two@example.com', 'STF000002');

    expect(response.status).toBe(409);
    expect(response.body).toEqual({
      code: 'DUPLICATE_ENTRY',
      message: 'username is already taken',
      field: 'username',
    });
  });
});
