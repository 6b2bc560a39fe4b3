import { calcCartTotal, calcItemCount, calcLineSubtotal, formatAmount, formatPrice } from "../pricing/calc";
import { cartItemKey, type Cart, type CartItemId } from "./schema";

export type CartLineView = {
  id: CartItemId;
  key: string;
  name: string;
  quantity: number;
  unitPriceLabel: string;
  subtotal: number;
  subtotalLabel: string;
  detailLabel: string;
};

export type CartView = {
  isEmpty: boolean;
  itemCount: number;
  total: number;
  totalLabel: string;
  lines: CartLineView[];
};

export function renderCart(cart: Cart): CartView {
  const total = calcCartTotal(cart);
  return {
    isEmpty: cart.length === 0,
    itemCount: calcItemCount(cart),
    total,
    totalLabel: formatAmount(total),
    lines: cart.map((line) => {
      const subtotal = calcLineSubtotal(line);
      const unitPriceLabel = formatPrice(line.price);
      const subtotalLabel = formatPrice(subtotal);
      return {
        id: line.id,
        key: cartItemKey(line.id),
        name: line.name,
        quantity: line.quantity,
        unitPriceLabel,
        subtotal,
        subtotalLabel,
        detailLabel: `${unitPriceLabel} x ${line.quantity} = ${subtotalLabel}`,
      };
    }),
  };
}
