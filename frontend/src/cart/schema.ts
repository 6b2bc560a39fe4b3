import { z } from "zod";

export const cartItemIdSchema = z.union([z.string().min(1), z.number().finite()]);

export const cartLineSchema = z.object({
  id: cartItemIdSchema,
  name: z.string().min(1),
  price: z.number().finite().nonnegative(),
  quantity: z.number().int().positive(),
});

export const cartSchema = z.array(cartLineSchema).superRefine((lines, ctx) => {
  const seen = new Set<string>();
  lines.forEach((line, index) => {
    const key = cartItemKey(line.id);
    if (seen.has(key)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `duplicate cart line for item ${key}`,
        path: [index, "id"],
      });
    }
    seen.add(key);
  });
});

export type CartItemId = z.infer<typeof cartItemIdSchema>;
export type CartLine = z.infer<typeof cartLineSchema>;
export type Cart = CartLine[];

export function cartItemKey(id: CartItemId): string {
  return String(id);
}

export function sameCartItem(a: CartItemId, b: CartItemId): boolean {
  return cartItemKey(a) === cartItemKey(b);
}

export function isValidCart(value: unknown): value is Cart {
  return cartSchema.safeParse(value).success;
}

export function parseCart(value: unknown): Cart | null {
  const result = cartSchema.safeParse(value);
  return result.success ? result.data : null;
}
