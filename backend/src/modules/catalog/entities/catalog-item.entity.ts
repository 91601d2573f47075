import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
} from 'typeorm';
import { ApprovalStatus, ItemCategory } from '@event-hub/shared';
import { VendorProfile } from '@/modules/identity/entities/vendor-profile.entity';

/**
 * Catalog Item Entity
 *
 * A product or service offered by one vendor. Only APPROVED items of ACTIVE
 * vendors are orderable; any vendor edit sends the item back to PENDING.
 */
@Entity({ name: 'catalog_items' })
@Index(['approvalStatus', 'category'])
export class CatalogItem {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar' })
  @Index()
  vendorId!: string;

  @ManyToOne(() => VendorProfile, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'vendorId' })
  vendor?: VendorProfile;

  @Column({ type: 'varchar', length: 200 })
  name!: string;

  @Column({ type: 'text', default: '' })
  description!: string;

  /** Unit price in cents */
  @Column({ type: 'integer' })
  priceCents!: number;

  @Column({ type: 'varchar', length: 50 })
  category!: ItemCategory;

  @Column({ type: 'varchar', length: 20, default: ApprovalStatus.PENDING })
  approvalStatus!: ApprovalStatus;

  @Column({ type: 'varchar', length: 500, nullable: true })
  reviewNote!: string | null;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
