import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { MAX_CART_QUANTITY } from '@event-hub/shared';
import { AuthorizationService } from '@/modules/authorization/services/authorization.service';
import { Principal } from '@/modules/authorization/principal';
import { CatalogService } from '@/modules/catalog/services/catalog.service';
import { CartEntry } from '../entities/cart-entry.entity';
import { CartView } from '../dto/cart.dto';

/**
 * Per-user pre-order selection. One entry per (user, item); adding an item
 * already in the cart raises its quantity, capped at MAX_CART_QUANTITY.
 */
@Injectable()
export class CartService {
  private readonly logger = new Logger(CartService.name);

  constructor(
    @InjectRepository(CartEntry)
    private readonly entries: Repository<CartEntry>,
    private readonly authorization: AuthorizationService,
    private readonly catalogService: CatalogService,
  ) {}

  async list(principal: Principal): Promise<CartView> {
    this.authorization.assertCan(principal, 'cart_entry', 'list');

    const entries = await this.entries.find({
      where: { userId: principal.id },
      relations: { item: { vendor: true } },
      order: { createdAt: 'ASC' },
    });

    const views = entries.flatMap((entry) =>
      entry.item
        ? [
            {
              id: entry.id,
              itemId: entry.itemId,
              quantity: entry.quantity,
              item: entry.item,
              amountCents: entry.item.priceCents * entry.quantity,
              available: CatalogService.isOrderable(entry.item),
            },
          ]
        : [],
    );

    return {
      entries: views,
      totalCents: views.reduce((sum, view) => sum + view.amountCents, 0),
    };
  }

  async add(principal: Principal, itemId: string, quantity = 1): Promise<CartView> {
    this.authorization.assertCan(principal, 'cart_entry', 'create');

    const item = await this.catalogService.findOrderable(itemId);
    if (!item) {
      throw this.authorization.notFound('catalog_item');
    }

    const existing = await this.entries.findOne({
      where: { userId: principal.id, itemId },
    });

    if (existing) {
      await this.entries.update(
        { id: existing.id },
        { quantity: Math.min(existing.quantity + quantity, MAX_CART_QUANTITY) },
      );
    } else {
      await this.entries.save(
        this.entries.create({
          userId: principal.id,
          itemId,
          quantity: Math.min(quantity, MAX_CART_QUANTITY),
        }),
      );
    }

    this.logger.debug(`User ${principal.id} added ${quantity} × ${itemId} to cart`);
    return this.list(principal);
  }

  async updateQuantity(principal: Principal, entryId: string, quantity: number): Promise<CartView> {
    const entry = await this.loadOwn(principal, 'update', entryId);
    await this.entries.update({ id: entry.id }, { quantity: Math.min(quantity, MAX_CART_QUANTITY) });
    return this.list(principal);
  }

  async remove(principal: Principal, entryId: string): Promise<CartView> {
    const entry = await this.loadOwn(principal, 'delete', entryId);
    await this.entries.delete({ id: entry.id });
    return this.list(principal);
  }

  async clear(principal: Principal): Promise<CartView> {
    this.authorization.assertCan(principal, 'cart_entry', 'delete');
    await this.entries.delete({ userId: principal.id });
    return { entries: [], totalCents: 0 };
  }

  private async loadOwn(
    principal: Principal,
    action: 'update' | 'delete',
    entryId: string,
  ): Promise<CartEntry> {
    return this.authorization.resolve(
      principal,
      action,
      'cart_entry',
      () => this.entries.findOne({ where: { id: entryId } }),
      (entry) => entry.userId,
    );
  }
}
