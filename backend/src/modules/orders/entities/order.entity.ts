import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  OneToMany,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
} from 'typeorm';
import { OrderStatus } from '@event-hub/shared';
import { bigintToNumber } from '@/common/database/bigint.transformer';
import { OrderLine } from './order-line.entity';

/**
 * Order Entity
 *
 * Created from a user's cart. Lines are snapshots, so `totalCents` is fixed
 * at creation and never follows later catalog price changes.
 *
 * Status Flow:
 * PENDING -> PAID -> COMPLETED
 *    └────────┴-> CANCELLED
 */
@Entity({ name: 'orders' })
@Index(['userId', 'createdAt'])
export class Order {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar' })
  userId!: string;

  @Column({ type: 'varchar', length: 20, default: OrderStatus.PENDING })
  status!: OrderStatus;

  @Column({ type: 'bigint', transformer: bigintToNumber })
  totalCents!: number;

  @OneToMany(() => OrderLine, (line) => line.order, { cascade: ['insert'] })
  lines!: OrderLine[];

  @Column({ type: Date, nullable: true })
  paidAt!: Date | null;

  @Column({ type: Date, nullable: true })
  cancelledAt!: Date | null;

  @Column({ type: Date, nullable: true })
  completedAt!: Date | null;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
