import { createLogger } from "../logging/logger";
import type { CartManager } from "./manager";

const logger = createLogger("cart");

export const ADD_TO_CART_SELECTOR = ".add-to-cart";

export type TriggerItem = {
  id: string;
  name: string;
  price: number;
  quantity: number;
};

export function readTriggerItem(trigger: HTMLElement): TriggerItem | null {
  const { id, name, price, quantity } = trigger.dataset;
  if (!id || !name || !price) {
    return null;
  }
  const parsedPrice = Number.parseFloat(price);
  if (!Number.isFinite(parsedPrice)) {
    return null;
  }
  const parsedQuantity = quantity ? Number.parseInt(quantity, 10) : 1;
  if (!Number.isInteger(parsedQuantity) || parsedQuantity <= 0) {
    return null;
  }
  return { id, name, price: parsedPrice, quantity: parsedQuantity };
}

/**
 * Listens for clicks on server-rendered add-to-cart buttons below `root`.
 * One delegated listener covers buttons added after binding.
 */
export function bindAddToCartTriggers(root: Document | HTMLElement, manager: CartManager): () => void {
  const onClick = (event: Event) => {
    const target = event.target;
    if (!(target instanceof Element)) {
      return;
    }
    const trigger = target.closest<HTMLElement>(ADD_TO_CART_SELECTOR);
    if (!trigger || !root.contains(trigger)) {
      return;
    }
    const item = readTriggerItem(trigger);
    if (!item) {
      logger.warn("add-to-cart trigger has incomplete item data", { dataset: { ...trigger.dataset } });
      return;
    }
    manager.addItem(item.id, item.name, item.price, item.quantity);
  };

  root.addEventListener("click", onClick);
  return () => root.removeEventListener("click", onClick);
}
