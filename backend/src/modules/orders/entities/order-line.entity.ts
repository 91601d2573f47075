import { Column, Entity, Index, JoinColumn, ManyToOne, PrimaryGeneratedColumn } from 'typeorm';
import { bigintToNumber } from '@/common/database/bigint.transformer';
import { CatalogItem } from '@/modules/catalog/entities/catalog-item.entity';
import { Order } from './order.entity';

/**
 * Snapshot of a catalog item at order time. The vendor reference lets each
 * vendor see only its own lines of a shared order.
 */
@Entity({ name: 'order_lines' })
export class OrderLine {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar' })
  orderId!: string;

  @ManyToOne(() => Order, (order) => order.lines, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'orderId' })
  order?: Order;

  @Column({ type: 'varchar' })
  @Index()
  vendorId!: string;

  @Column({ type: 'varchar', nullable: true })
  itemId!: string | null;

  @ManyToOne(() => CatalogItem, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'itemId' })
  item?: CatalogItem | null;

  @Column({ type: 'varchar', length: 200 })
  itemName!: string;

  @Column({ type: 'text', default: '' })
  itemDescription!: string;

  @Column({ type: 'integer' })
  unitPriceCents!: number;

  @Column({ type: 'integer' })
  quantity!: number;

  /** unitPriceCents × quantity */
  @Column({ type: 'bigint', transformer: bigintToNumber })
  amountCents!: number;

  @Column({ type: Date, nullable: true })
  fulfilledAt!: Date | null;
}
