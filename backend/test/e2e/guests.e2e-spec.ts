/**
 * Guest List E2E Tests
 */

import { INestApplication } from '@nestjs/common';
import { ErrorCode, RsvpStatus } from '@event-hub/shared';
import {
  authDelete,
  authGet,
  authPost,
  authPut,
  closeTestApp,
  createTestApp,
  createUser,
  resetDatabase,
  TestAccount,
} from './setup';

describe('Guest List E2E Tests', () => {
  let app: INestApplication;
  let user: TestAccount;

  beforeAll(async () => {
    app = await createTestApp();
  });

  afterAll(async () => {
    await closeTestApp();
  });

  beforeEach(async () => {
    await resetDatabase(app);
    user = await createUser(app, 'Uma');
  });

  const addGuest = async (body: Record<string, unknown>): Promise<string> => {
    const response = await authPost(app, '/api/user/guests', user.accessToken)
      .send(body)
      .expect(201);
    return response.body.id;
  };

  it('should add a guest with a pending RSVP by default', async () => {
    const response = await authPost(app, '/api/user/guests', user.accessToken)
      .send({ name: '  Grace  ', contact: 'grace@example.com' })
      .expect(201);

    expect(response.body).toMatchObject({
      name: 'Grace',
      contact: 'grace@example.com',
      rsvpStatus: RsvpStatus.PENDING,
      userId: user.id,
    });
  });

  it('should store a missing contact as null', async () => {
    const id = await addGuest({ name: 'Hal' });

    const list = await authGet(app, '/api/user/guests', user.accessToken).expect(200);

    expect(list.body).toHaveLength(1);
    expect(list.body[0]).toMatchObject({ id, name: 'Hal', contact: null });
  });

  it('should reject an unknown RSVP status', async () => {
    const response = await authPost(app, '/api/user/guests', user.accessToken)
      .send({ name: 'Hal', rsvpStatus: 'maybe' })
      .expect(400);

    expect(response.body.code).toBe(ErrorCode.VALIDATION_FAILED);
  });

  it('should update the RSVP status', async () => {
    const id = await addGuest({ name: 'Grace' });

    const response = await authPut(app, `/api/user/guests/${id}`, user.accessToken)
      .send({ rsvpStatus: RsvpStatus.CONFIRMED })
      .expect(200);

    expect(response.body.rsvpStatus).toBe(RsvpStatus.CONFIRMED);
    expect(response.body.name).toBe('Grace');
  });

  it('should remove a guest', async () => {
    const id = await addGuest({ name: 'Grace' });

    const response = await authDelete(app, `/api/user/guests/${id}`, user.accessToken).expect(200);
    expect(response.body).toEqual({ id, deleted: true });

    await authDelete(app, `/api/user/guests/${id}`, user.accessToken).expect(404);
  });

  it('should count guests by RSVP status', async () => {
    await addGuest({ name: 'Grace', rsvpStatus: RsvpStatus.CONFIRMED });
    await addGuest({ name: 'Hal', rsvpStatus: RsvpStatus.CONFIRMED });
    await addGuest({ name: 'Ida', rsvpStatus: RsvpStatus.DECLINED });
    await addGuest({ name: 'Jon' });

    const response = await authGet(app, '/api/user/guests/summary', user.accessToken).expect(200);

    expect(response.body).toEqual({ pending: 1, confirmed: 2, declined: 1, total: 4 });
  });

  it('should keep guest lists separate per user', async () => {
    await addGuest({ name: 'Grace' });
    const other = await createUser(app, 'Ivan');

    const list = await authGet(app, '/api/user/guests', other.accessToken).expect(200);
    const summary = await authGet(app, '/api/user/guests/summary', other.accessToken).expect(200);

    expect(list.body).toEqual([]);
    expect(summary.body).toEqual({ pending: 0, confirmed: 0, declined: 0, total: 0 });
  });
});
