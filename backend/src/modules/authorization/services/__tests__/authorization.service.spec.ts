import { Test, TestingModule } from '@nestjs/testing';
import { ForbiddenException, NotFoundException } from '@nestjs/common';
import { MembershipStatus, UserRole } from '@event-hub/shared';
import { AuthorizationService } from '../authorization.service';
import { Principal } from '../../principal';

describe('AuthorizationService', () => {
  let service: AuthorizationService;

  // Test data
  const admin: Principal = {
    id: 'admin-1',
    email: 'admin@example.com',
    name: 'Admin',
    role: UserRole.ADMIN,
    vendorId: null,
    membershipStatus: null,
  };

  const vendor: Principal = {
    id: 'vendor-user-1',
    email: 'vendor@example.com',
    name: 'Vendor',
    role: UserRole.VENDOR,
    vendorId: 'vendor-1',
    membershipStatus: MembershipStatus.ACTIVE,
  };

  const user: Principal = {
    id: 'user-1',
    email: 'user@example.com',
    name: 'User',
    role: UserRole.USER,
    vendorId: null,
    membershipStatus: null,
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [AuthorizationService],
    }).compile();

    service = module.get<AuthorizationService>(AuthorizationService);
  });

  describe('can', () => {
    it('should allow admins to review catalog items', () => {
      expect(service.can(UserRole.ADMIN, 'catalog_item', 'approve')).toBe(true);
      expect(service.can(UserRole.ADMIN, 'catalog_item', 'reject')).toBe(true);
    });

    it('should not let admins act on orders or carts', () => {
      expect(service.can(UserRole.ADMIN, 'order', 'pay')).toBe(false);
      expect(service.can(UserRole.ADMIN, 'cart_entry', 'create')).toBe(false);
    });

    it('should not let vendors approve their own items', () => {
      expect(service.can(UserRole.VENDOR, 'catalog_item', 'update')).toBe(true);
      expect(service.can(UserRole.VENDOR, 'catalog_item', 'approve')).toBe(false);
    });

    it('should only let users browse the catalog', () => {
      expect(service.can(UserRole.USER, 'catalog_item', 'browse')).toBe(true);
      expect(service.can(UserRole.USER, 'catalog_item', 'create')).toBe(false);
      expect(service.can(UserRole.USER, 'identity', 'list')).toBe(false);
    });
  });

  describe('assertCan', () => {
    it('should return the grant for an allowed action', () => {
      expect(service.assertCan(user, 'order', 'pay').scope).toBe('own');
      expect(service.assertCan(admin, 'identity', 'delete').scope).toBe('any');
    });

    it('should throw ForbiddenException for a role-level denial', () => {
      expect(() => service.assertCan(user, 'catalog_item', 'approve')).toThrow(ForbiddenException);
      expect(() => service.assertCan(vendor, 'order', 'pay')).toThrow(
        'Role vendor may not pay order',
      );
    });

    it('should refuse an own grant where any scope is required', () => {
      expect(() => service.assertCan(vendor, 'vendor_profile', 'update', 'any')).toThrow(
        'Role vendor may not update vendor_profile',
      );
      expect(() => service.assertCan(vendor, 'catalog_item', 'delete', 'any')).toThrow(
        ForbiddenException,
      );
      expect(service.assertCan(admin, 'catalog_item', 'delete', 'any').scope).toBe('any');
    });

    it('should require a vendor profile for vendor-owned resources', () => {
      const orphan: Principal = { ...vendor, vendorId: null, membershipStatus: null };

      expect(() => service.assertCan(orphan, 'catalog_item', 'create')).toThrow(
        'Vendor profile required',
      );
    });
  });

  describe('authorize', () => {
    it('should pass for the owner of an own-scoped record', () => {
      expect(() =>
        service.authorize(user, 'read', { type: 'order', ownerId: 'user-1' }),
      ).not.toThrow();
    });

    it('should report a foreign record as not found', () => {
      expect(() =>
        service.authorize(user, 'read', { type: 'order', ownerId: 'user-2' }),
      ).toThrow(NotFoundException);
      expect(() =>
        service.authorize(user, 'read', { type: 'order', ownerId: 'user-2' }),
      ).toThrow('Order not found');
    });

    it('should key vendor resources on the vendor profile', () => {
      expect(() =>
        service.authorize(vendor, 'update', { type: 'catalog_item', ownerId: 'vendor-1' }),
      ).not.toThrow();
      expect(() =>
        service.authorize(vendor, 'update', { type: 'catalog_item', ownerId: 'vendor-user-1' }),
      ).toThrow('Item not found');
    });

    it('should ignore ownership for any-scoped grants', () => {
      expect(() =>
        service.authorize(admin, 'delete', { type: 'catalog_item', ownerId: 'vendor-9' }),
      ).not.toThrow();
    });
  });

  describe('resolve', () => {
    it('should return the loaded record for its owner', async () => {
      const guest = { id: 'guest-1', userId: 'user-1' };

      const result = await service.resolve(
        user,
        'update',
        'guest',
        async () => guest,
        (record) => record.userId,
      );

      expect(result).toBe(guest);
    });

    it('should throw NotFoundException when the record is missing', async () => {
      await expect(
        service.resolve(user, 'update', 'guest', async () => null, () => 'user-1'),
      ).rejects.toThrow('Guest not found');
    });

    it('should not load anything when the role is denied', async () => {
      const load = jest.fn();

      await expect(
        service.resolve(vendor, 'update', 'guest', load, () => 'user-1'),
      ).rejects.toThrow(ForbiddenException);
      expect(load).not.toHaveBeenCalled();
    });
  });
});
