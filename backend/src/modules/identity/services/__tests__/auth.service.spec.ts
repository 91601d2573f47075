import { Test, TestingModule } from '@nestjs/testing';
import { UnauthorizedException } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import { UserRole, UserStatus } from '@event-hub/shared';
import { AuthService } from '../auth.service';
import { UsersService } from '../users.service';
import { PasswordService } from '../password.service';

describe('AuthService', () => {
  let service: AuthService;

  // Test data
  const mockUser = {
    id: 'user-123',
    name: 'Test User',
    email: 'test@example.com',
    passwordHash: 'stored-digest',
    role: UserRole.USER,
    status: UserStatus.ACTIVE,
    createdAt: new Date('2026-01-01T00:00:00Z'),
    updatedAt: new Date('2026-01-01T00:00:00Z'),
  };

  const mockUsersService = {
    createIdentity: jest.fn(),
    findByEmailWithPassword: jest.fn(),
    findPrincipal: jest.fn(),
  };

  const mockPasswords = {
    hash: jest.fn(),
    verify: jest.fn(),
  };

  const mockJwtService = {
    sign: jest.fn(),
    decode: jest.fn(),
  };

  beforeEach(async () => {
    jest.clearAllMocks();
    mockJwtService.sign.mockReturnValue('signed-token');
    mockJwtService.decode.mockReturnValue({ sub: 'user-123', role: UserRole.USER, iat: 0, exp: 86_400 });

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        AuthService,
        { provide: UsersService, useValue: mockUsersService },
        { provide: PasswordService, useValue: mockPasswords },
        { provide: JwtService, useValue: mockJwtService },
      ],
    }).compile();

    service = module.get<AuthService>(AuthService);
  });

  describe('register', () => {
    it('should default the role to user', async () => {
      mockUsersService.createIdentity.mockResolvedValue(mockUser);

      const result = await service.register({
        name: 'Test User',
        email: 'test@example.com',
        password: 'secret1',
      });

      expect(mockUsersService.createIdentity).toHaveBeenCalledWith({
        name: 'Test User',
        email: 'test@example.com',
        password: 'secret1',
        role: UserRole.USER,
      });
      expect(result).toEqual({
        id: 'user-123',
        name: 'Test User',
        email: 'test@example.com',
        role: UserRole.USER,
        status: UserStatus.ACTIVE,
        createdAt: mockUser.createdAt,
        updatedAt: mockUser.updatedAt,
      });
    });

    it('should not expose the password digest', async () => {
      mockUsersService.createIdentity.mockResolvedValue(mockUser);

      const result = await service.register({
        name: 'Test User',
        email: 'test@example.com',
        password: 'secret1',
      });

      expect(result).not.toHaveProperty('passwordHash');
    });
  });

  describe('registerVendor', () => {
    it('should create a vendor identity with the company name', async () => {
      mockUsersService.createIdentity.mockResolvedValue({ ...mockUser, role: UserRole.VENDOR });

      await service.registerVendor({
        name: 'Val',
        email: 'val@example.com',
        password: 'secret1',
        companyName: 'Val Catering',
      });

      expect(mockUsersService.createIdentity).toHaveBeenCalledWith({
        name: 'Val',
        email: 'val@example.com',
        password: 'secret1',
        role: UserRole.VENDOR,
        companyName: 'Val Catering',
      });
    });
  });

  describe('login', () => {
    it('should issue a token for valid credentials', async () => {
      mockUsersService.findByEmailWithPassword.mockResolvedValue(mockUser);
      mockPasswords.verify.mockResolvedValue(true);

      const result = await service.login({ email: 'test@example.com', password: 'secret1' });

      expect(mockJwtService.sign).toHaveBeenCalledWith({ sub: 'user-123', role: UserRole.USER });
      expect(result.accessToken).toBe('signed-token');
      expect(mockJwtService.decode).toHaveBeenCalledWith('signed-token');
      expect(result.expiresAt).toBe('1970-01-02T00:00:00.000Z');
      expect(result.user.id).toBe('user-123');
    });

    it('should reject a wrong password', async () => {
      mockUsersService.findByEmailWithPassword.mockResolvedValue(mockUser);
      mockPasswords.verify.mockResolvedValue(false);

      await expect(
        service.login({ email: 'test@example.com', password: 'wrong-password' }),
      ).rejects.toThrow('Invalid credentials');
      expect(mockJwtService.sign).not.toHaveBeenCalled();
    });

    it('should reject an unknown email without checking a password', async () => {
      mockUsersService.findByEmailWithPassword.mockResolvedValue(null);

      await expect(
        service.login({ email: 'nobody@example.com', password: 'secret1' }),
      ).rejects.toThrow(UnauthorizedException);
      expect(mockPasswords.verify).not.toHaveBeenCalled();
    });

    it('should reject a disabled account', async () => {
      mockUsersService.findByEmailWithPassword.mockResolvedValue({
        ...mockUser,
        status: UserStatus.DISABLED,
      });
      mockPasswords.verify.mockResolvedValue(true);

      await expect(
        service.login({ email: 'test@example.com', password: 'secret1' }),
      ).rejects.toThrow('Invalid credentials');
    });
  });

  describe('validateJwt', () => {
    it('should return the live principal', async () => {
      const principal = {
        id: 'user-123',
        email: 'test@example.com',
        name: 'Test User',
        role: UserRole.USER,
        vendorId: null,
        membershipStatus: null,
      };
      mockUsersService.findPrincipal.mockResolvedValue(principal);

      await expect(service.validateJwt({ sub: 'user-123', role: UserRole.USER })).resolves.toBe(
        principal,
      );
    });

    it('should reject tokens of missing or disabled accounts', async () => {
      mockUsersService.findPrincipal.mockResolvedValue(null);

      await expect(
        service.validateJwt({ sub: 'user-123', role: UserRole.USER }),
      ).rejects.toThrow('Account not found or disabled');
    });
  });

  describe('issue', () => {
    it('should report the expiry the token was signed with', () => {
      // signed with expiresIn '2w' at iat 1_000_000
      mockJwtService.decode.mockReturnValue({ sub: 'user-123', role: UserRole.USER, exp: 2_209_600 });

      const result = service.issue({ id: 'user-123', role: UserRole.USER });

      expect(result.expiresAt).toBe('1970-01-26T13:46:40.000Z');
    });

    it('should refuse a token signed without expiry', () => {
      mockJwtService.decode.mockReturnValue({ sub: 'user-123', role: UserRole.USER });

      expect(() => service.issue({ id: 'user-123', role: UserRole.USER })).toThrow(
        'Access tokens must be signed with an expiry',
      );
    });
  });
});
