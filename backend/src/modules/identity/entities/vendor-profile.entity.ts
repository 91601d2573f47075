import {
  Column,
  CreateDateColumn,
  Entity,
  JoinColumn,
  OneToOne,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
} from 'typeorm';
import { MembershipStatus } from '@event-hub/shared';
import { User } from './user.entity';

/**
 * Vendor Profile
 *
 * Owned by exactly one vendor identity. Membership is the admin-controlled
 * visibility gate: items of a vendor that is not ACTIVE never reach users,
 * whatever their own approval status.
 */
@Entity({ name: 'vendor_profiles' })
export class VendorProfile {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', unique: true })
  userId!: string;

  @OneToOne(() => User, (user) => user.vendorProfile, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'userId' })
  user?: User;

  @Column({ type: 'varchar', length: 200 })
  companyName!: string;

  @Column({ type: 'varchar', length: 20, default: MembershipStatus.PENDING })
  membershipStatus!: MembershipStatus;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
