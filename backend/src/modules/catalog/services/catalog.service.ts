import { ForbiddenException, Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { FindOptionsWhere, In, Repository } from 'typeorm';
import {
  APPROVAL_TRANSITIONS,
  ApprovalStatus,
  ItemCategory,
  MembershipStatus,
} from '@event-hub/shared';
import { InvalidTransitionException } from '@/common/errors/domain.exceptions';
import { AuthorizationService } from '@/modules/authorization/services/authorization.service';
import { Principal } from '@/modules/authorization/principal';
import { VendorsService } from '@/modules/identity/services/vendors.service';
import { CatalogItem } from '../entities/catalog-item.entity';
import { CreateItemDto, UpdateItemDto } from '../dto/catalog.dto';

/**
 * Catalog Service
 *
 * Vendor item management, admin review and marketplace browsing.
 *
 * Approval Flow:
 * ```
 * create/edit → PENDING → APPROVED
 *                  ↓          ↓
 *               REJECTED ←────┘
 * ```
 * Users only ever see APPROVED items of ACTIVE vendors.
 */
@Injectable()
export class CatalogService {
  private readonly logger = new Logger(CatalogService.name);

  constructor(
    @InjectRepository(CatalogItem)
    private readonly items: Repository<CatalogItem>,
    private readonly authorization: AuthorizationService,
    private readonly vendorsService: VendorsService,
  ) {}

  /**
   * Whether an item can be put in a cart or paid for.
   * The vendor relation must be loaded.
   */
  static isOrderable(item: CatalogItem): boolean {
    return (
      item.approvalStatus === ApprovalStatus.APPROVED &&
      item.vendor?.membershipStatus === MembershipStatus.ACTIVE
    );
  }

  // ==================== VENDOR ====================

  async listOwn(principal: Principal): Promise<CatalogItem[]> {
    this.authorization.assertCan(principal, 'catalog_item', 'list');
    const vendorId = this.requireVendorId(principal);

    return this.items.find({
      where: { vendorId },
      order: { createdAt: 'DESC' },
    });
  }

  async createOwn(principal: Principal, dto: CreateItemDto): Promise<CatalogItem> {
    this.authorization.assertCan(principal, 'catalog_item', 'create');
    const vendorId = this.requireVendorId(principal);

    const item = await this.items.save(
      this.items.create({
        vendorId,
        name: dto.name,
        description: dto.description ?? '',
        priceCents: dto.priceCents,
        category: dto.category,
        approvalStatus: ApprovalStatus.PENDING,
        reviewNote: null,
      }),
    );

    this.logger.log(`Item ${item.id} created by vendor ${vendorId}, awaiting review`);
    return item;
  }

  /**
   * Any edit sends the item back to review
   */
  async updateOwn(principal: Principal, id: string, dto: UpdateItemDto): Promise<CatalogItem> {
    const item = await this.loadOwn(principal, 'update', id);

    const changes: Partial<
      Pick<CatalogItem, 'name' | 'description' | 'priceCents' | 'category' | 'approvalStatus' | 'reviewNote'>
    > = {
      approvalStatus: ApprovalStatus.PENDING,
      reviewNote: null,
    };
    if (dto.name !== undefined) changes.name = dto.name;
    if (dto.description !== undefined) changes.description = dto.description;
    if (dto.priceCents !== undefined) changes.priceCents = dto.priceCents;
    if (dto.category !== undefined) changes.category = dto.category;

    await this.items.update({ id: item.id }, changes);

    if (item.approvalStatus !== ApprovalStatus.PENDING) {
      this.logger.log(`Item ${id} edited, ${item.approvalStatus} → ${ApprovalStatus.PENDING}`);
    }

    return this.findById(id);
  }

  async removeOwn(principal: Principal, id: string): Promise<void> {
    const item = await this.loadOwn(principal, 'delete', id);
    await this.items.delete({ id: item.id });
    this.logger.log(`Item ${id} deleted by vendor ${item.vendorId}`);
  }

  // ==================== ADMIN ====================

  async listAll(filter: { approvalStatus?: ApprovalStatus } = {}): Promise<CatalogItem[]> {
    const where: FindOptionsWhere<CatalogItem> = {};
    if (filter.approvalStatus) {
      where.approvalStatus = filter.approvalStatus;
    }

    return this.items.find({
      where,
      relations: { vendor: true },
      order: { createdAt: 'ASC' },
    });
  }

  async approve(id: string, reviewerId: string): Promise<CatalogItem> {
    return this.review(id, ApprovalStatus.APPROVED, reviewerId, null);
  }

  async reject(id: string, reviewerId: string, note?: string): Promise<CatalogItem> {
    return this.review(id, ApprovalStatus.REJECTED, reviewerId, note ?? null);
  }

  async removeAny(id: string): Promise<void> {
    const result = await this.items.delete({ id });
    if (!result.affected) {
      throw this.authorization.notFound('catalog_item');
    }
    this.logger.log(`Item ${id} deleted by admin`);
  }

  // ==================== MARKETPLACE ====================

  /**
   * Approved items of active vendors
   */
  async browse(filter: { category?: ItemCategory } = {}): Promise<CatalogItem[]> {
    const where: FindOptionsWhere<CatalogItem> = {
      approvalStatus: ApprovalStatus.APPROVED,
      vendor: { membershipStatus: MembershipStatus.ACTIVE },
    };
    if (filter.category) {
      where.category = filter.category;
    }

    return this.items.find({
      where,
      relations: { vendor: true },
      order: { name: 'ASC' },
    });
  }

  /**
   * Approved items of one vendor; inactive vendors are not found
   */
  async browseVendor(vendorId: string): Promise<CatalogItem[]> {
    await this.vendorsService.findActive(vendorId);

    return this.items.find({
      where: { vendorId, approvalStatus: ApprovalStatus.APPROVED },
      order: { name: 'ASC' },
    });
  }

  /**
   * An item a user may order, or null
   */
  async findOrderable(id: string): Promise<CatalogItem | null> {
    const item = await this.items.findOne({ where: { id }, relations: { vendor: true } });
    return item && CatalogService.isOrderable(item) ? item : null;
  }

  async findById(id: string): Promise<CatalogItem> {
    const item = await this.items.findOne({ where: { id } });
    if (!item) {
      throw this.authorization.notFound('catalog_item');
    }
    return item;
  }

  private requireVendorId(principal: Principal): string {
    if (!principal.vendorId) {
      throw new ForbiddenException('Vendor profile required');
    }
    return principal.vendorId;
  }

  private async loadOwn(
    principal: Principal,
    action: 'update' | 'delete',
    id: string,
  ): Promise<CatalogItem> {
    return this.authorization.resolve(
      principal,
      action,
      'catalog_item',
      () => this.items.findOne({ where: { id } }),
      (item) => item.vendorId,
    );
  }

  /**
   * Compare-and-set on the approval status: only sources that allow the
   * target are matched, so concurrent reviews cannot both apply.
   */
  private async review(
    id: string,
    toStatus: ApprovalStatus,
    reviewerId: string,
    note: string | null,
  ): Promise<CatalogItem> {
    const allowedFrom = Object.values(ApprovalStatus).filter((from) =>
      APPROVAL_TRANSITIONS[from].includes(toStatus),
    );

    const result = await this.items.update(
      { id, approvalStatus: In(allowedFrom) },
      { approvalStatus: toStatus, reviewNote: note },
    );

    if (!result.affected) {
      const current = await this.findById(id);
      throw new InvalidTransitionException(
        `Invalid transition: ${current.approvalStatus} → ${toStatus}`,
      );
    }

    this.logger.log(`Item ${id} ${toStatus} by ${reviewerId}`);
    return this.findById(id);
  }
}
