import { bpsToDecimal } from '../core/math.js';
import { OrderRecord } from '../core/types.js';

// float slack so a spacing of exactly one step is accepted
const SPACING_EPSILON = 1e-9;

/**
 * Resting close orders of one instrument, kept sorted by price. Enforces the
 * grid step: any two resting closes sit at least `gridStepBps` apart.
 */
export class ActiveCloseOrderSet {
  private orders: OrderRecord[] = [];

  constructor(private readonly gridStepBps: number) {}

  get size(): number {
    return this.orders.length;
  }

  list(): readonly OrderRecord[] {
    return this.orders;
  }

  get(orderId: string): OrderRecord | undefined {
    return this.orders.find((order) => order.id === orderId);
  }

  /** The resting close that a new order at `price` would sit too close to. */
  conflictFor(price: number): OrderRecord | undefined {
    if (this.gridStepBps <= 0) {
      return undefined;
    }
    return this.orders.find((order) => {
      const resting = order.requestedPrice ?? 0;
      const minGap = bpsToDecimal(this.gridStepBps) * Math.max(price, resting);
      return Math.abs(price - resting) + SPACING_EPSILON * minGap < minGap;
    });
  }

  canPlace(price: number): boolean {
    return this.conflictFor(price) === undefined;
  }

  add(order: OrderRecord): void {
    if (order.requestedPrice === undefined) {
      throw new Error(`close order ${order.id} has no price`);
    }
    if (!this.canPlace(order.requestedPrice)) {
      throw new Error(`close order ${order.id} violates the grid step`);
    }
    this.orders = [...this.orders, order].sort(
      (a, b) => (a.requestedPrice ?? 0) - (b.requestedPrice ?? 0)
    );
  }

  remove(orderId: string): OrderRecord | undefined {
    const order = this.get(orderId);
    if (order) {
      this.orders = this.orders.filter((entry) => entry.id !== orderId);
    }
    return order;
  }
}
