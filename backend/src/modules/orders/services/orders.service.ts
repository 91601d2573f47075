import { ForbiddenException, Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, EntityManager, In, IsNull, Not, Repository } from 'typeorm';
import { OrderStatus } from '@event-hub/shared';
import {
  EmptyCartException,
  InvalidTransitionException,
  ItemUnavailableException,
} from '@/common/errors/domain.exceptions';
import { AuthorizationService } from '@/modules/authorization/services/authorization.service';
import { Principal } from '@/modules/authorization/principal';
import { Action } from '@/modules/authorization/access-policy';
import { CatalogService } from '@/modules/catalog/services/catalog.service';
import { CartEntry } from '@/modules/cart/entities/cart-entry.entity';
import { Order } from '../entities/order.entity';
import { OrderLine } from '../entities/order-line.entity';
import { OrderStatusHistory } from '../entities/order-status-history.entity';
import { VendorRequestView } from '../dto/orders.dto';
import { OrderStateMachine } from './order-state-machine.service';

/**
 * Orders Service
 *
 * Converts carts into orders and drives them through their lifecycle.
 * Lines are snapshots of the catalog at creation: later price edits or
 * item deletions never change an existing order.
 */
@Injectable()
export class OrdersService {
  private readonly logger = new Logger(OrdersService.name);

  constructor(
    @InjectRepository(Order)
    private readonly orders: Repository<Order>,
    private readonly dataSource: DataSource,
    private readonly stateMachine: OrderStateMachine,
    private readonly authorization: AuthorizationService,
  ) {}

  // ==================== USER ====================

  /**
   * Create a pending order from the caller's cart and empty the cart.
   * Order, lines, history and cart clear commit together.
   */
  async createFromCart(principal: Principal): Promise<Order> {
    this.authorization.assertCan(principal, 'order', 'create');

    const orderId = await this.dataSource.transaction(async (manager) => {
      const entries = await manager.find(CartEntry, {
        where: { userId: principal.id },
        relations: { item: { vendor: true } },
        order: { createdAt: 'ASC' },
      });

      if (entries.length === 0) {
        throw new EmptyCartException();
      }

      const lines = entries.map((entry) => {
        const item = entry.item;
        if (!item || !CatalogService.isOrderable(item)) {
          throw new ItemUnavailableException(item?.name ?? entry.itemId);
        }

        return manager.create(OrderLine, {
          vendorId: item.vendorId,
          itemId: item.id,
          itemName: item.name,
          itemDescription: item.description,
          unitPriceCents: item.priceCents,
          quantity: entry.quantity,
          amountCents: item.priceCents * entry.quantity,
          fulfilledAt: null,
        });
      });

      const order = await manager.save(
        manager.create(Order, {
          userId: principal.id,
          status: OrderStatus.PENDING,
          totalCents: lines.reduce((sum, line) => sum + line.amountCents, 0),
          paidAt: null,
          cancelledAt: null,
          completedAt: null,
          lines,
        }),
      );

      await this.stateMachine.recordCreation(manager, order.id, principal.id);
      await manager.delete(CartEntry, { userId: principal.id });

      this.logger.log(
        `Order ${order.id} created by ${principal.id}: ${lines.length} line(s), ${order.totalCents} cents`,
      );
      return order.id;
    });

    return this.findWithLines(orderId);
  }

  async list(principal: Principal): Promise<Order[]> {
    this.authorization.assertCan(principal, 'order', 'list');

    return this.orders.find({
      where: { userId: principal.id },
      relations: { lines: true },
      order: { createdAt: 'DESC' },
    });
  }

  async get(principal: Principal, id: string): Promise<Order> {
    return this.authorization.resolve(
      principal,
      'read',
      'order',
      () => this.orders.findOne({ where: { id }, relations: { lines: true } }),
      (order) => order.userId,
    );
  }

  /**
   * PENDING → PAID. The total must be positive and every line's item still
   * orderable.
   */
  async pay(principal: Principal, id: string): Promise<Order> {
    await this.dataSource.transaction(async (manager) => {
      const order = await this.loadOwn(manager, principal, 'pay', id);

      if (order.status !== OrderStatus.PENDING) {
        throw new InvalidTransitionException(`Cannot pay a ${order.status} order`);
      }

      if (order.totalCents <= 0) {
        throw new InvalidTransitionException('Order total must be positive');
      }

      const lines = await manager.find(OrderLine, {
        where: { orderId: order.id },
        relations: { item: { vendor: true } },
      });

      const unavailable = lines.find((line) => !line.item || !CatalogService.isOrderable(line.item));
      if (unavailable) {
        throw new InvalidTransitionException(
          `Item "${unavailable.itemName}" is no longer available`,
        );
      }

      await this.stateMachine.transition(manager, order, OrderStatus.PAID, principal.id);
    });

    return this.findWithLines(id);
  }

  /**
   * PENDING or PAID → CANCELLED, while nothing has been fulfilled. The
   * order row is held before the fulfilled lines are counted.
   */
  async cancel(principal: Principal, id: string, reason?: string): Promise<Order> {
    await this.dataSource.transaction(async (manager) => {
      const order = await this.loadOwn(manager, principal, 'cancel', id);
      await this.stateMachine.hold(manager, order);

      const fulfilled = await manager.count(OrderLine, {
        where: { orderId: order.id, fulfilledAt: Not(IsNull()) },
      });
      if (fulfilled > 0) {
        throw new InvalidTransitionException('Cannot cancel an order with fulfilled lines');
      }

      await this.stateMachine.transition(manager, order, OrderStatus.CANCELLED, principal.id, reason);
    });

    return this.findWithLines(id);
  }

  async history(principal: Principal, id: string): Promise<OrderStatusHistory[]> {
    const order = await this.get(principal, id);
    return this.stateMachine.getHistory(this.dataSource.manager, order.id);
  }

  // ==================== VENDOR ====================

  /**
   * Orders containing the vendor's lines, newest first, each narrowed to
   * those lines
   */
  async listRequests(principal: Principal): Promise<VendorRequestView[]> {
    this.authorization.assertCan(principal, 'order_line', 'list');
    const vendorId = this.requireVendorId(principal);

    const manager = this.dataSource.manager;
    const lines = await manager.find(OrderLine, { where: { vendorId } });
    if (lines.length === 0) {
      return [];
    }

    const orders = await manager.find(Order, {
      where: { id: In([...new Set(lines.map((line) => line.orderId))]) },
      order: { createdAt: 'DESC' },
    });

    return orders.map((order) => {
      const own = lines.filter((line) => line.orderId === order.id);
      return {
        id: order.id,
        status: order.status,
        lines: own,
        subtotalCents: own.reduce((sum, line) => sum + line.amountCents, 0),
        createdAt: order.createdAt,
      };
    });
  }

  /**
   * Stamp the vendor's open lines of a PAID order as fulfilled; the order
   * completes once no line is left open.
   */
  async fulfill(principal: Principal, orderId: string): Promise<VendorRequestView> {
    this.authorization.assertCan(principal, 'order_line', 'fulfill');
    const vendorId = this.requireVendorId(principal);

    await this.dataSource.transaction(async (manager) => {
      const lines = await manager.find(OrderLine, { where: { orderId, vendorId } });
      if (lines.length === 0) {
        throw this.authorization.notFound('order_line');
      }

      const order = await manager.findOne(Order, { where: { id: orderId } });
      if (!order) {
        throw this.authorization.notFound('order');
      }

      if (order.status !== OrderStatus.PAID) {
        throw new InvalidTransitionException(`Cannot fulfill a ${order.status} order`);
      }

      const open = lines.filter((line) => line.fulfilledAt === null);
      if (open.length === 0) {
        throw new InvalidTransitionException('Lines already fulfilled');
      }

      // A concurrent cancel either waits for this commit and sees the
      // fulfilled lines, or has already moved the order off PAID
      await this.stateMachine.hold(manager, order);

      await manager.update(
        OrderLine,
        { id: In(open.map((line) => line.id)), fulfilledAt: IsNull() },
        { fulfilledAt: new Date() },
      );
      this.logger.log(`Vendor ${vendorId} fulfilled ${open.length} line(s) of order ${orderId}`);

      const remaining = await manager.count(OrderLine, {
        where: { orderId, fulfilledAt: IsNull() },
      });
      if (remaining === 0) {
        await this.stateMachine.transition(
          manager,
          order,
          OrderStatus.COMPLETED,
          principal.id,
          'All lines fulfilled',
        );
      }
    });

    const requests = await this.listRequests(principal);
    const view = requests.find((request) => request.id === orderId);
    if (!view) {
      throw this.authorization.notFound('order_line');
    }
    return view;
  }

  private async loadOwn(
    manager: EntityManager,
    principal: Principal,
    action: Action,
    id: string,
  ): Promise<Order> {
    return this.authorization.resolve(
      principal,
      action,
      'order',
      () => manager.findOne(Order, { where: { id } }),
      (order) => order.userId,
    );
  }

  private async findWithLines(id: string): Promise<Order> {
    const order = await this.orders.findOne({ where: { id }, relations: { lines: true } });
    if (!order) {
      throw this.authorization.notFound('order');
    }
    return order;
  }

  private requireVendorId(principal: Principal): string {
    if (!principal.vendorId) {
      throw new ForbiddenException('Vendor profile required');
    }
    return principal.vendorId;
  }
}
