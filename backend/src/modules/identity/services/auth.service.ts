import { Injectable, Logger, UnauthorizedException } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import { UserRole, UserStatus } from '@event-hub/shared';
import { Principal } from '@/modules/authorization/principal';
import { UsersService } from './users.service';
import { PasswordService } from './password.service';
import {
  AuthResponseDto,
  LoginDto,
  RegisterDto,
  RegisterVendorDto,
  toUserResponse,
  UserResponseDto,
} from '../dto/auth.dto';
import { User } from '../entities/user.entity';

export interface JwtPayload {
  sub: string; // User ID
  role: UserRole;
  iat?: number;
  exp?: number;
}

/**
 * Authentication Service
 *
 * Email/password login issuing one signed, expiring access token.
 * Tokens are stateless: nothing is stored server-side, and every request
 * re-reads the identity so disabled accounts lose access immediately.
 */
@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    private readonly usersService: UsersService,
    private readonly passwords: PasswordService,
    private readonly jwtService: JwtService,
  ) {}

  /**
   * Self-registration as user or vendor
   */
  async register(dto: RegisterDto): Promise<UserResponseDto> {
    const user = await this.usersService.createIdentity({
      name: dto.name,
      email: dto.email,
      password: dto.password,
      role: dto.role ?? UserRole.USER,
    });

    return toUserResponse(user);
  }

  /**
   * Vendor registration with company details
   */
  async registerVendor(dto: RegisterVendorDto): Promise<UserResponseDto> {
    const user = await this.usersService.createIdentity({
      name: dto.name,
      email: dto.email,
      password: dto.password,
      role: UserRole.VENDOR,
      companyName: dto.companyName,
    });

    return toUserResponse(user);
  }

  /**
   * Verify credentials and issue an access token
   */
  async login(dto: LoginDto): Promise<AuthResponseDto> {
    const user = await this.usersService.findByEmailWithPassword(dto.email);

    const valid = user !== null && (await this.passwords.verify(dto.password, user.passwordHash));

    if (!user || !valid || user.status !== UserStatus.ACTIVE) {
      this.logger.warn(`Failed login for ${dto.email}`);
      throw new UnauthorizedException('Invalid credentials');
    }

    return {
      ...this.issue(user),
      user: toUserResponse(user),
    };
  }

  /**
   * Sign a token for an identity. `expiresAt` is read back from the signed
   * `exp` claim, so it always matches what verification enforces.
   */
  issue(user: Pick<User, 'id' | 'role'>): { accessToken: string; expiresAt: string } {
    const payload: JwtPayload = { sub: user.id, role: user.role };
    const accessToken = this.jwtService.sign(payload);

    const { exp } = this.jwtService.decode<JwtPayload>(accessToken);
    if (exp === undefined) {
      throw new Error('Access tokens must be signed with an expiry');
    }

    return { accessToken, expiresAt: new Date(exp * 1000).toISOString() };
  }

  /**
   * Validate JWT payload and return the live principal
   */
  async validateJwt(payload: JwtPayload): Promise<Principal> {
    const principal = await this.usersService.findPrincipal(payload.sub);

    if (!principal) {
      throw new UnauthorizedException('Account not found or disabled');
    }

    return principal;
  }
}
