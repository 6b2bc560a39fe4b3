import { env } from "../config/env";

export type CartLinePricing = {
  quantity: number;
  price: number;
};

const amountFormatter = new Intl.NumberFormat(env.locale, {
  minimumFractionDigits: 0,
  maximumFractionDigits: 0,
});

// No currency symbol: the layout already prints "$" next to the amount.
export function formatAmount(value: number): string {
  return amountFormatter.format(value);
}

export function formatPrice(value: number): string {
  return `$${formatAmount(value)}`;
}

export function calcLineSubtotal(line: CartLinePricing): number {
  return line.price * line.quantity;
}

export function calcItemCount(lines: CartLinePricing[]): number {
  return lines.reduce((count, line) => count + line.quantity, 0);
}

export function calcCartTotal(lines: CartLinePricing[]): number {
  return lines.reduce((total, line) => total + calcLineSubtotal(line), 0);
}
