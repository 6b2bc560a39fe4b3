import { describe, expect, it } from "vitest";

import { isValidCart, parseCart } from "./schema";

describe("cart schema", () => {
  it("accepts an empty cart and lines with string or numeric ids", () => {
    expect(isValidCart([])).toBe(true);
    expect(
      isValidCart([
        { id: "42", name: "Roll A", price: 3500, quantity: 1 },
        { id: 7, name: "Gyozas", price: 0, quantity: 3 },
      ])
    ).toBe(true);
  });

  it("rejects values that are not arrays", () => {
    expect(isValidCart(null)).toBe(false);
    expect(isValidCart({ id: "1", name: "X", price: 1000, quantity: 1 })).toBe(false);
    expect(isValidCart("[]")).toBe(false);
  });

  it("rejects the whole cart when one line is malformed", () => {
    const good = { id: "1", name: "X", price: 1000, quantity: 1 };
    expect(isValidCart([good, { id: "2", name: "Y", price: 500 }])).toBe(false);
    expect(isValidCart([good, { id: "2", name: "Y", price: "500", quantity: 1 }])).toBe(false);
    expect(isValidCart([good, { id: true, name: "Y", price: 500, quantity: 1 }])).toBe(false);
    expect(isValidCart([good, null])).toBe(false);
  });

  it("rejects non-positive and fractional quantities", () => {
    expect(isValidCart([{ id: "1", name: "X", price: 1000, quantity: 0 }])).toBe(false);
    expect(isValidCart([{ id: "1", name: "X", price: 1000, quantity: -2 }])).toBe(false);
    expect(isValidCart([{ id: "1", name: "X", price: 1000, quantity: 1.5 }])).toBe(false);
  });

  it("rejects negative prices and empty names", () => {
    expect(isValidCart([{ id: "1", name: "X", price: -1, quantity: 1 }])).toBe(false);
    expect(isValidCart([{ id: "1", name: "", price: 100, quantity: 1 }])).toBe(false);
  });

  it("rejects two lines for the same item, even across id types", () => {
    expect(
      isValidCart([
        { id: "1", name: "X", price: 1000, quantity: 1 },
        { id: 1, name: "X", price: 1000, quantity: 2 },
      ])
    ).toBe(false);
  });

  it("drops unknown fields when decoding", () => {
    expect(parseCart([{ id: "1", name: "X", price: 1000, quantity: 2, note: "sin sésamo" }])).toEqual([
      { id: "1", name: "X", price: 1000, quantity: 2 },
    ]);
    expect(parseCart([{ id: "1" }])).toBeNull();
  });
});
