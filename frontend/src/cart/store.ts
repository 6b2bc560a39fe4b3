import { env } from "../config/env";
import { createLogger } from "../logging/logger";
import { isValidCart, parseCart, type Cart } from "./schema";

const logger = createLogger("cart");

export type KeyValueStorage = Pick<Storage, "getItem" | "setItem" | "removeItem">;

export type CartChangeListener = () => void;

export function createMemoryStorage(initial: Record<string, string> = {}): KeyValueStorage {
  const values = new Map<string, string>(Object.entries(initial));
  return {
    getItem: (key) => values.get(key) ?? null,
    setItem: (key, value) => {
      values.set(key, String(value));
    },
    removeItem: (key) => {
      values.delete(key);
    },
  };
}

export function resolveBrowserStorage(): KeyValueStorage {
  try {
    const storage = window.localStorage;
    const probeKey = `${env.cartStorageKey}:probe`;
    storage.setItem(probeKey, "1");
    storage.removeItem(probeKey);
    return storage;
  } catch (error) {
    logger.warn("localStorage unavailable, cart will not survive reloads", { error });
    return createMemoryStorage();
  }
}

/**
 * Durable home of the cart. Every read re-validates what is stored, since
 * the value can be edited from outside the page.
 */
export class CartStore {
  private readonly listeners = new Set<CartChangeListener>();

  public constructor(
    private readonly storage: KeyValueStorage,
    public readonly key: string = env.cartStorageKey
  ) {}

  public read(): Cart {
    let raw: string | null;
    try {
      raw = this.storage.getItem(this.key);
    } catch (error) {
      logger.error("cart storage read failed", { key: this.key, error });
      return [];
    }
    if (raw === null) {
      return [];
    }

    let decoded: unknown;
    try {
      decoded = JSON.parse(raw);
    } catch {
      this.discard("stored cart is not valid json");
      return [];
    }

    const cart = parseCart(decoded);
    if (!cart) {
      this.discard("stored cart failed validation");
      return [];
    }
    return cart;
  }

  public write(cart: Cart): boolean {
    if (!isValidCart(cart)) {
      logger.error("refusing to persist invalid cart", { key: this.key, cart });
      return false;
    }
    try {
      this.storage.setItem(this.key, JSON.stringify(cart));
    } catch (error) {
      logger.error("cart storage write failed", { key: this.key, error });
      return false;
    }
    this.emit();
    return true;
  }

  public clear(): void {
    try {
      this.storage.removeItem(this.key);
    } catch (error) {
      logger.error("cart storage clear failed", { key: this.key, error });
    }
    this.emit();
  }

  public subscribe(listener: CartChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private discard(reason: string): void {
    logger.warn(reason, { key: this.key });
    try {
      this.storage.removeItem(this.key);
    } catch (error) {
      logger.error("cart storage clear failed", { key: this.key, error });
    }
  }

  private emit(): void {
    for (const listener of [...this.listeners]) {
      listener();
    }
  }
}
