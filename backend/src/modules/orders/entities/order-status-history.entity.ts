import { Column, CreateDateColumn, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';
import { OrderStatus, ORDER_CREATED_FROM } from '@event-hub/shared';

/**
 * Append-only audit trail of order transitions
 */
@Entity({ name: 'order_status_history' })
export class OrderStatusHistory {
  /** Monotonic, gives a stable order within the same timestamp */
  @PrimaryGeneratedColumn('increment')
  id!: number;

  @Column({ type: 'varchar' })
  @Index()
  orderId!: string;

  @Column({ type: 'varchar', length: 20 })
  fromStatus!: OrderStatus | typeof ORDER_CREATED_FROM;

  @Column({ type: 'varchar', length: 20 })
  toStatus!: OrderStatus;

  /** Identity that caused the transition */
  @Column({ type: 'varchar' })
  changedBy!: string;

  @Column({ type: 'varchar', length: 500, nullable: true })
  reason!: string | null;

  @CreateDateColumn()
  createdAt!: Date;
}
