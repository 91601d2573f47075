import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { FindOptionsWhere, Repository } from 'typeorm';
import { MembershipStatus } from '@event-hub/shared';
import { AuthorizationService } from '@/modules/authorization/services/authorization.service';
import { Principal } from '@/modules/authorization/principal';
import { VendorProfile } from '../entities/vendor-profile.entity';
import { AdminUpdateVendorDto, UpdateVendorProfileDto } from '../dto/vendors.dto';

@Injectable()
export class VendorsService {
  private readonly logger = new Logger(VendorsService.name);

  constructor(
    @InjectRepository(VendorProfile)
    private readonly vendors: Repository<VendorProfile>,
    private readonly authorization: AuthorizationService,
  ) {}

  /**
   * The calling vendor's own profile
   */
  async getOwnProfile(principal: Principal): Promise<VendorProfile> {
    return this.authorization.resolve(
      principal,
      'read',
      'vendor_profile',
      () => this.vendors.findOne({ where: { userId: principal.id }, relations: { user: true } }),
      (profile) => profile.id,
    );
  }

  async updateOwnProfile(principal: Principal, dto: UpdateVendorProfileDto): Promise<VendorProfile> {
    const profile = await this.authorization.resolve(
      principal,
      'update',
      'vendor_profile',
      () => this.vendors.findOne({ where: { userId: principal.id } }),
      (found) => found.id,
    );

    await this.vendors.update({ id: profile.id }, { companyName: dto.companyName });
    return this.getOwnProfile(principal);
  }

  async list(filter: { membershipStatus?: MembershipStatus } = {}): Promise<VendorProfile[]> {
    const where: FindOptionsWhere<VendorProfile> = {};
    if (filter.membershipStatus) {
      where.membershipStatus = filter.membershipStatus;
    }

    return this.vendors.find({
      where,
      relations: { user: true },
      order: { createdAt: 'ASC' },
    });
  }

  async findById(id: string): Promise<VendorProfile> {
    const profile = await this.vendors.findOne({ where: { id }, relations: { user: true } });

    if (!profile) {
      throw new NotFoundException('Vendor not found');
    }

    return profile;
  }

  /**
   * Admin edit of company name and/or membership
   */
  async update(id: string, dto: AdminUpdateVendorDto): Promise<VendorProfile> {
    const profile = await this.findById(id);

    const changes: Partial<Pick<VendorProfile, 'companyName' | 'membershipStatus'>> = {};
    if (dto.companyName !== undefined) changes.companyName = dto.companyName;
    if (dto.membershipStatus !== undefined) changes.membershipStatus = dto.membershipStatus;

    if (Object.keys(changes).length > 0) {
      await this.vendors.update({ id }, changes);
    }

    if (changes.membershipStatus && changes.membershipStatus !== profile.membershipStatus) {
      this.logger.log(
        `Vendor ${id} membership: ${profile.membershipStatus} → ${changes.membershipStatus}`,
      );
    }

    return this.findById(id);
  }

  async setMembership(id: string, membershipStatus: MembershipStatus): Promise<VendorProfile> {
    return this.update(id, { membershipStatus });
  }

  /**
   * Vendors visible in the marketplace
   */
  async listActive(): Promise<VendorProfile[]> {
    return this.vendors.find({
      where: { membershipStatus: MembershipStatus.ACTIVE },
      order: { companyName: 'ASC' },
    });
  }

  /**
   * An active vendor by id; inactive and unknown vendors are both "not found"
   */
  async findActive(id: string): Promise<VendorProfile> {
    const profile = await this.vendors.findOne({
      where: { id, membershipStatus: MembershipStatus.ACTIVE },
    });

    if (!profile) {
      throw new NotFoundException('Vendor not found');
    }

    return profile;
  }
}
