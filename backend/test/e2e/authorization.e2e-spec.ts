/**
 * Authorization E2E Tests
 *
 * Role gates and ownership isolation:
 * - Routes are restricted by role
 * - Records owned by someone else look like missing records
 */

import { INestApplication } from '@nestjs/common';
import request from 'supertest';
import { ErrorCode, ItemCategory, MembershipStatus } from '@event-hub/shared';
import {
  authDelete,
  authGet,
  authPost,
  authPut,
  closeTestApp,
  createApprovedItem,
  createTestApp,
  createUser,
  createVendor,
  loginAdmin,
  resetDatabase,
  TestAccount,
  TestItem,
  TestVendor,
} from './setup';

describe('Authorization E2E Tests', () => {
  let app: INestApplication;
  let adminToken: string;
  let vendor: TestVendor;
  let item: TestItem;
  let owner: TestAccount;
  let intruder: TestAccount;

  beforeAll(async () => {
    app = await createTestApp();
  });

  afterAll(async () => {
    await closeTestApp();
  });

  beforeEach(async () => {
    await resetDatabase(app);
    adminToken = await loginAdmin(app);
    vendor = await createVendor(app, 'Bloom', { activateWith: adminToken });
    item = await createApprovedItem(app, vendor, adminToken, { name: 'Roses', priceCents: 4500 });
    owner = await createUser(app, 'Uma');
    intruder = await createUser(app, 'Ivan');
  });

  describe('role gates', () => {
    it('should require a token', async () => {
      const response = await request(app.getHttpServer()).get('/api/user/cart').expect(401);

      expect(response.body.code).toBe(ErrorCode.UNAUTHORIZED);
    });

    it('should keep users out of admin routes', async () => {
      const response = await authGet(app, '/api/admin/users', owner.accessToken).expect(403);

      expect(response.body.code).toBe(ErrorCode.FORBIDDEN);
    });

    it('should keep users out of vendor routes', async () => {
      await authGet(app, '/api/vendor/items', owner.accessToken).expect(403);
      await authGet(app, '/api/vendor/requests', owner.accessToken).expect(403);
    });

    it('should keep vendors out of every admin route', async () => {
      const pending = await createVendor(app, 'Lumen');
      const hidden = await authPost(app, '/api/vendor/items', pending.accessToken)
        .send({ name: 'Fairy lights', priceCents: 2000, category: ItemCategory.LIGHTING })
        .expect(201);
      const token = pending.accessToken;

      const attempts = [
        authGet(app, '/api/admin/users', token),
        authPost(app, '/api/admin/users', token).send({
          name: 'Eve',
          email: 'eve@example.com',
          password: 'test-password',
        }),
        authPut(app, `/api/admin/users/${owner.id}`, token).send({ name: 'Eve' }),
        authDelete(app, `/api/admin/users/${owner.id}`, token),
        authGet(app, '/api/admin/vendors', token),
        authPut(app, `/api/admin/vendors/${vendor.vendorId}`, token).send({ companyName: 'Renamed' }),
        authPut(app, `/api/admin/memberships/${pending.vendorId}`, token).send({
          membershipStatus: MembershipStatus.ACTIVE,
        }),
        authGet(app, '/api/admin/items', token),
        authPut(app, `/api/admin/items/${hidden.body.id}/approve`, token),
        authPut(app, `/api/admin/items/${item.id}/reject`, token).send({}),
        authDelete(app, `/api/admin/items/${item.id}`, token),
      ];

      for (const attempt of attempts) {
        const response = await attempt.expect(403);
        expect(response.body.code).toBe(ErrorCode.FORBIDDEN);
      }

      const profile = await authGet(app, '/api/vendor/profile', token).expect(200);
      expect(profile.body.membershipStatus).toBe(MembershipStatus.PENDING);

      const items = await authGet(app, '/api/admin/items', adminToken).expect(200);
      expect(items.body.map((entry: { id: string }) => entry.id).sort()).toEqual(
        [item.id, hidden.body.id].sort(),
      );

      const vendors = await authGet(app, '/api/admin/vendors', adminToken).expect(200);
      expect(
        vendors.body.find((entry: { id: string }) => entry.id === vendor.vendorId).companyName,
      ).toBe('Bloom');
    });

    it('should keep vendors out of user routes', async () => {
      await authGet(app, '/api/user/cart', vendor.accessToken).expect(403);
      await authPost(app, '/api/user/orders', vendor.accessToken).expect(403);
      await authGet(app, '/api/user/guests', vendor.accessToken).expect(403);
    });

    it('should keep admins out of shopping routes', async () => {
      await authPost(app, '/api/user/cart', adminToken)
        .send({ itemId: item.id })
        .expect(403);
    });
  });

  describe('ownership isolation', () => {
    it("should hide another user's order", async () => {
      await authPost(app, '/api/user/cart', owner.accessToken).send({ itemId: item.id }).expect(201);
      const order = await authPost(app, '/api/user/orders', owner.accessToken).expect(201);

      const get = await authGet(app, `/api/user/orders/${order.body.id}`, intruder.accessToken).expect(
        404,
      );
      expect(get.body.code).toBe(ErrorCode.NOT_FOUND);
      expect(get.body.message).toBe('Order not found');

      await authPut(app, `/api/user/orders/${order.body.id}/pay`, intruder.accessToken).expect(404);
      await authPut(app, `/api/user/orders/${order.body.id}/cancel`, intruder.accessToken)
        .send({})
        .expect(404);
      await authGet(app, `/api/user/orders/${order.body.id}/history`, intruder.accessToken).expect(
        404,
      );

      const list = await authGet(app, '/api/user/orders', intruder.accessToken).expect(200);
      expect(list.body).toEqual([]);
    });

    it("should hide another user's cart entry", async () => {
      const cart = await authPost(app, '/api/user/cart', owner.accessToken)
        .send({ itemId: item.id })
        .expect(201);
      const entryId = cart.body.entries[0].id;

      const response = await authPut(app, `/api/user/cart/${entryId}`, intruder.accessToken)
        .send({ quantity: 5 })
        .expect(404);
      expect(response.body.message).toBe('Cart item not found');

      await authDelete(app, `/api/user/cart/${entryId}`, intruder.accessToken).expect(404);

      const ownCart = await authGet(app, '/api/user/cart', owner.accessToken).expect(200);
      expect(ownCart.body.entries[0].quantity).toBe(1);
    });

    it("should hide another user's guest", async () => {
      const guest = await authPost(app, '/api/user/guests', owner.accessToken)
        .send({ name: 'Grace' })
        .expect(201);

      const response = await authPut(app, `/api/user/guests/${guest.body.id}`, intruder.accessToken)
        .send({ name: 'Mallory' })
        .expect(404);
      expect(response.body.message).toBe('Guest not found');

      await authDelete(app, `/api/user/guests/${guest.body.id}`, intruder.accessToken).expect(404);
    });

    it("should hide another vendor's item", async () => {
      const other = await createVendor(app, 'Lumen', { activateWith: adminToken });

      const response = await authDelete(app, `/api/vendor/items/${item.id}`, other.accessToken).expect(
        404,
      );
      expect(response.body.message).toBe('Item not found');
    });

    it("should not let a vendor fulfill another vendor's request", async () => {
      const other = await createVendor(app, 'Lumen', { activateWith: adminToken });
      await authPost(app, '/api/user/cart', owner.accessToken).send({ itemId: item.id }).expect(201);
      const order = await authPost(app, '/api/user/orders', owner.accessToken).expect(201);
      await authPut(app, `/api/user/orders/${order.body.id}/pay`, owner.accessToken).expect(200);

      await authPut(app, `/api/vendor/requests/${order.body.id}/fulfill`, other.accessToken).expect(
        404,
      );

      const requests = await authGet(app, '/api/vendor/requests', other.accessToken).expect(200);
      expect(requests.body).toEqual([]);
    });
  });
});
