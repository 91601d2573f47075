import {
  Injectable,
  Logger,
  NotFoundException,
  UnauthorizedException,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, EntityManager, FindOptionsWhere, Repository } from 'typeorm';
import { MembershipStatus, UserRole, UserStatus } from '@event-hub/shared';
import { EmailTakenException, InvalidTransitionException } from '@/common/errors/domain.exceptions';
import { Principal } from '@/modules/authorization/principal';
import { Order } from '@/modules/orders/entities/order.entity';
import { OrderLine } from '@/modules/orders/entities/order-line.entity';
import { User } from '../entities/user.entity';
import { VendorProfile } from '../entities/vendor-profile.entity';
import { UpdateMeDto } from '../dto/auth.dto';
import { UpdateUserDto } from '../dto/users.dto';
import { PasswordService } from './password.service';

export interface NewIdentity {
  name: string;
  email: string;
  password: string;
  role: UserRole;
  /** Vendor accounts only; defaults to "<name>'s Company" */
  companyName?: string;
}

export interface RemoveUserResult {
  deleted: boolean;
  disabled: boolean;
}

/**
 * Credential store and admin-side identity management.
 *
 * Identities referenced by orders (as buyer or as vendor of a line) are never
 * removed; deleting them disables the account instead.
 */
@Injectable()
export class UsersService {
  private readonly logger = new Logger(UsersService.name);

  constructor(
    @InjectRepository(User)
    private readonly users: Repository<User>,
    private readonly dataSource: DataSource,
    private readonly passwords: PasswordService,
  ) {}

  /**
   * Create an identity, with a pending vendor profile for vendor accounts
   */
  async createIdentity(data: NewIdentity): Promise<User> {
    const passwordHash = await this.passwords.hash(data.password);

    return this.dataSource.transaction(async (manager) => {
      await this.assertEmailAvailable(manager, data.email);

      const user = await manager.save(
        manager.create(User, {
          name: data.name,
          email: data.email,
          passwordHash,
          role: data.role,
          status: UserStatus.ACTIVE,
        }),
      );

      if (user.role === UserRole.VENDOR) {
        user.vendorProfile = await this.createVendorProfile(
          manager,
          user,
          data.companyName,
        );
      }

      this.logger.log(`Identity created: ${user.id} (${user.role})`);
      return user;
    });
  }

  async findById(id: string): Promise<User> {
    const user = await this.users.findOne({
      where: { id },
      relations: { vendorProfile: true },
    });

    if (!user) {
      throw new NotFoundException('User not found');
    }

    return user;
  }

  /**
   * Load an identity including its password digest, for credential checks
   */
  async findByEmailWithPassword(email: string): Promise<User | null> {
    return this.users
      .createQueryBuilder('user')
      .addSelect('user.passwordHash')
      .where('user.email = :email', { email: email.trim().toLowerCase() })
      .getOne();
  }

  /**
   * Resolve the live principal for a token subject.
   * Missing and disabled identities resolve to null.
   */
  async findPrincipal(id: string): Promise<Principal | null> {
    const user = await this.users.findOne({
      where: { id },
      relations: { vendorProfile: true },
    });

    if (!user || user.status !== UserStatus.ACTIVE) {
      return null;
    }

    return {
      id: user.id,
      email: user.email,
      name: user.name,
      role: user.role,
      vendorId: user.vendorProfile?.id ?? null,
      membershipStatus: user.vendorProfile?.membershipStatus ?? null,
    };
  }

  async list(filter: { role?: UserRole } = {}): Promise<User[]> {
    const where: FindOptionsWhere<User> = {};
    if (filter.role) {
      where.role = filter.role;
    }

    return this.users.find({ where, order: { createdAt: 'ASC' } });
  }

  /**
   * Admin update of name, email, role or status
   */
  async update(actor: Principal, id: string, dto: UpdateUserDto): Promise<User> {
    if (
      actor.id === id &&
      ((dto.role !== undefined && dto.role !== UserRole.ADMIN) ||
        dto.status === UserStatus.DISABLED)
    ) {
      throw new InvalidTransitionException('Administrators cannot demote or disable themselves');
    }

    await this.dataSource.transaction(async (manager) => {
      const user = await manager.findOne(User, {
        where: { id },
        relations: { vendorProfile: true },
      });

      if (!user) {
        throw new NotFoundException('User not found');
      }

      if (dto.email !== undefined && dto.email !== user.email) {
        await this.assertEmailAvailable(manager, dto.email);
      }

      const changes: Partial<Pick<User, 'name' | 'email' | 'role' | 'status'>> = {};
      if (dto.name !== undefined) changes.name = dto.name;
      if (dto.email !== undefined) changes.email = dto.email;
      if (dto.role !== undefined) changes.role = dto.role;
      if (dto.status !== undefined) changes.status = dto.status;

      if (Object.keys(changes).length > 0) {
        await manager.update(User, { id }, changes);
      }

      if (changes.role === UserRole.VENDOR && !user.vendorProfile) {
        await this.createVendorProfile(manager, user);
      }
    });

    this.logger.log(`User ${id} updated by ${actor.id}`);
    return this.findById(id);
  }

  /**
   * Hard-delete an unreferenced identity, otherwise disable it
   */
  async remove(actor: Principal, id: string): Promise<RemoveUserResult> {
    if (actor.id === id) {
      throw new InvalidTransitionException('Administrators cannot delete their own account');
    }

    const result = await this.dataSource.transaction(async (manager) => {
      const user = await manager.findOne(User, {
        where: { id },
        relations: { vendorProfile: true },
      });

      if (!user) {
        throw new NotFoundException('User not found');
      }

      const orderCount = await manager.count(Order, { where: { userId: id } });
      const lineCount = user.vendorProfile
        ? await manager.count(OrderLine, { where: { vendorId: user.vendorProfile.id } })
        : 0;

      if (orderCount + lineCount > 0) {
        await manager.update(User, { id }, { status: UserStatus.DISABLED });
        return { deleted: false, disabled: true };
      }

      await manager.delete(User, { id });
      return { deleted: true, disabled: false };
    });

    this.logger.log(
      `User ${id} ${result.deleted ? 'deleted' : 'disabled'} by ${actor.id}`,
    );
    return result;
  }

  /**
   * Self-service profile edit; a password change needs the current password
   */
  async updateSelf(userId: string, dto: UpdateMeDto): Promise<User> {
    const user = await this.users
      .createQueryBuilder('user')
      .addSelect('user.passwordHash')
      .where('user.id = :id', { id: userId })
      .getOne();

    if (!user) {
      throw new NotFoundException('User not found');
    }

    const changes: { name?: string; passwordHash?: string } = {};

    if (dto.name !== undefined) {
      changes.name = dto.name;
    }

    if (dto.newPassword !== undefined) {
      const valid =
        dto.currentPassword !== undefined &&
        (await this.passwords.verify(dto.currentPassword, user.passwordHash));

      if (!valid) {
        throw new UnauthorizedException('Current password is incorrect');
      }

      changes.passwordHash = await this.passwords.hash(dto.newPassword);
    }

    if (Object.keys(changes).length > 0) {
      await this.users.update({ id: userId }, changes);
    }

    return this.findById(userId);
  }

  private async assertEmailAvailable(manager: EntityManager, email: string): Promise<void> {
    const existing = await manager.findOne(User, { where: { email } });
    if (existing) {
      throw new EmailTakenException();
    }
  }

  private async createVendorProfile(
    manager: EntityManager,
    user: User,
    companyName?: string,
  ): Promise<VendorProfile> {
    return manager.save(
      manager.create(VendorProfile, {
        userId: user.id,
        companyName: companyName ?? `${user.name}'s Company`,
        membershipStatus: MembershipStatus.PENDING,
      }),
    );
  }
}
