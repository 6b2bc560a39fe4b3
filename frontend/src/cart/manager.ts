import { messages } from "../i18n/messages";
import { createLogger } from "../logging/logger";
import type { Notifier } from "../notifications/toasts";
import { sameCartItem, type Cart, type CartItemId } from "./schema";
import type { CartChangeListener, CartStore } from "./store";

const logger = createLogger("cart");

export type CartManagerOptions = {
  store: CartStore;
  notifier: Notifier;
};

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

export class CartManager {
  private readonly store: CartStore;
  private readonly notifier: Notifier;

  public constructor({ store, notifier }: CartManagerOptions) {
    this.store = store;
    this.notifier = notifier;
  }

  public get storageKey(): string {
    return this.store.key;
  }

  public getCart(): Cart {
    return this.store.read();
  }

  public subscribe(listener: CartChangeListener): () => void {
    return this.store.subscribe(listener);
  }

  public addItem(id: CartItemId, name: string, price: number | string, quantity = 1): boolean {
    if (!isPositiveInteger(quantity)) {
      logger.warn("cart add ignored: quantity must be a positive integer", { id, quantity });
      return false;
    }

    const cart = this.store.read();
    const existing = cart.find((line) => sameCartItem(line.id, id));
    const next: Cart = existing
      ? cart.map((line) => (line === existing ? { ...line, quantity: line.quantity + quantity } : line))
      : [...cart, { id, name, price: parsePrice(price), quantity }];

    if (!this.persist(next)) {
      return false;
    }
    logger.debug("cart item added", { id, quantity });
    this.notifier.success(messages.itemAdded);
    return true;
  }

  public removeItem(id: CartItemId): boolean {
    const cart = this.store.read();
    const next = cart.filter((line) => !sameCartItem(line.id, id));
    if (next.length === cart.length) {
      return true;
    }
    return this.persist(next);
  }

  public updateQuantity(id: CartItemId, quantity: number): boolean {
    const cart = this.store.read();
    const existing = cart.find((line) => sameCartItem(line.id, id));
    if (!existing) {
      return false;
    }
    if (quantity <= 0) {
      return this.removeItem(id);
    }
    if (!Number.isInteger(quantity)) {
      logger.warn("cart update ignored: quantity must be an integer", { id, quantity });
      return false;
    }
    return this.persist(cart.map((line) => (line === existing ? { ...line, quantity } : line)));
  }

  public clearCart(): void {
    this.store.clear();
  }

  private persist(cart: Cart): boolean {
    if (this.store.write(cart)) {
      return true;
    }
    this.notifier.error(messages.cartSaveFailed);
    return false;
  }
}

// Blank strings parse to NaN, which the cart schema refuses.
function parsePrice(price: number | string): number {
  return typeof price === "number" ? price : Number.parseFloat(price);
}
