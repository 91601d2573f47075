import { Injectable, Logger } from '@nestjs/common';
import { EntityManager } from 'typeorm';
import { ORDER_CREATED_FROM, ORDER_TRANSITIONS, OrderStatus } from '@event-hub/shared';
import { InvalidTransitionException } from '@/common/errors/domain.exceptions';
import { Order } from '../entities/order.entity';
import { OrderStatusHistory } from '../entities/order-status-history.entity';

type OrderTimestamps = Partial<Pick<Order, 'paidAt' | 'cancelledAt' | 'completedAt'>>;

/**
 * Order State Machine
 *
 * Validates order lifecycle transitions and keeps the audit trail.
 *
 * State Diagram:
 * ```
 * (cart) → PENDING → PAID → COMPLETED
 *             ↓        ↓
 *         CANCELLED ←──┘
 * ```
 *
 * Transitions run on the caller's transaction. The status update is a
 * compare-and-set on the status that was read, so of two concurrent
 * requests only the first applies; the second fails as an invalid transition.
 */
@Injectable()
export class OrderStateMachine {
  private readonly logger = new Logger(OrderStateMachine.name);

  /**
   * Check if a transition is valid
   */
  canTransition(fromStatus: OrderStatus, toStatus: OrderStatus): boolean {
    return ORDER_TRANSITIONS[fromStatus]?.includes(toStatus) ?? false;
  }

  /**
   * Move an order to a new status and record history
   */
  async transition(
    manager: EntityManager,
    order: Order,
    toStatus: OrderStatus,
    changedBy: string,
    reason?: string,
  ): Promise<void> {
    const fromStatus = order.status;

    if (!this.canTransition(fromStatus, toStatus)) {
      throw new InvalidTransitionException(
        `Invalid transition: ${fromStatus} → ${toStatus}. ` +
          `Allowed: ${ORDER_TRANSITIONS[fromStatus].join(', ') || 'none'}`,
      );
    }

    const result = await manager.update(
      Order,
      { id: order.id, status: fromStatus },
      { status: toStatus, ...this.timestampsFor(toStatus, new Date()) },
    );

    if (!result.affected) {
      throw new InvalidTransitionException(`Order ${order.id} is no longer ${fromStatus}`);
    }

    await manager.insert(OrderStatusHistory, {
      orderId: order.id,
      fromStatus,
      toStatus,
      changedBy,
      reason: reason ?? null,
    });

    this.logger.log(`Order ${order.id}: ${fromStatus} → ${toStatus} by ${changedBy}`);
  }

  /**
   * Lock the order row without changing its status, failing if the status
   * moved since it was read. Line writes that follow are serialized against
   * any concurrent transition of the same order.
   */
  async hold(manager: EntityManager, order: Order): Promise<void> {
    const result = await manager.update(
      Order,
      { id: order.id, status: order.status },
      { updatedAt: new Date() },
    );

    if (!result.affected) {
      throw new InvalidTransitionException(`Order ${order.id} is no longer ${order.status}`);
    }
  }

  /**
   * First history row of a newly created order
   */
  async recordCreation(manager: EntityManager, orderId: string, changedBy: string): Promise<void> {
    await manager.insert(OrderStatusHistory, {
      orderId,
      fromStatus: ORDER_CREATED_FROM,
      toStatus: OrderStatus.PENDING,
      changedBy,
      reason: 'Created from cart',
    });
  }

  /**
   * Audit trail of an order, oldest first
   */
  async getHistory(manager: EntityManager, orderId: string): Promise<OrderStatusHistory[]> {
    return manager.find(OrderStatusHistory, {
      where: { orderId },
      order: { id: 'ASC' },
    });
  }

  private timestampsFor(status: OrderStatus, at: Date): OrderTimestamps {
    switch (status) {
      case OrderStatus.PAID:
        return { paidAt: at };
      case OrderStatus.CANCELLED:
        return { cancelledAt: at };
      case OrderStatus.COMPLETED:
        return { completedAt: at };
      default:
        return {};
    }
  }
}
