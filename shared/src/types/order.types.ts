/**
 * Order Lifecycle States
 *
 * State machine transitions:
 * (cart) → PENDING → PAID → COMPLETED
 *             ↓        ↓
 *         CANCELLED ←──┘ (only while no line is fulfilled)
 */
export enum OrderStatus {
  /** Created from the cart, awaiting payment */
  PENDING = 'pending',
  /** Paid by the user, awaiting vendor fulfillment */
  PAID = 'paid',
  /** Cancelled by the user */
  CANCELLED = 'cancelled',
  /** Every line fulfilled by its vendor */
  COMPLETED = 'completed',
}

/** Valid state transitions for the order state machine */
export const ORDER_TRANSITIONS: Record<OrderStatus, OrderStatus[]> = {
  [OrderStatus.PENDING]: [OrderStatus.PAID, OrderStatus.CANCELLED],
  [OrderStatus.PAID]: [OrderStatus.COMPLETED, OrderStatus.CANCELLED],
  [OrderStatus.CANCELLED]: [],
  [OrderStatus.COMPLETED]: [],
};

/** Marker used as `fromStatus` for the creation history entry */
export const ORDER_CREATED_FROM = 'none';

/** Upper bound for a single cart entry */
export const MAX_CART_QUANTITY = 100;
