import type { Cart, CartItemId } from "../cart/schema";
import type { SessionContext } from "./session";

export type OrderRequestItem = {
  id: CartItemId;
  quantity: number;
};

export type OrderRequest = {
  items: OrderRequestItem[];
  is_delivery: boolean;
  token: string | null;
};

export function buildOrderRequest(cart: Cart, context: SessionContext): OrderRequest {
  return {
    items: cart.map((line) => ({ id: line.id, quantity: line.quantity })),
    is_delivery: context.kind === "delivery",
    token: context.kind === "table" ? context.token : null,
  };
}
