import { describe, expect, it } from "vitest";

import { buildOrderRequest } from "./request";
import { resolveSessionContext } from "./session";

describe("resolveSessionContext", () => {
  it("reads the table token from the last path segment", () => {
    expect(resolveSessionContext("/menu/a1b2c3")).toEqual({ kind: "table", token: "a1b2c3" });
  });

  it.each(["/delivery", "/menu/delivery", "/", "", "/menu/a1b2c3/"])("treats %j as a delivery order", (pathname) => {
    expect(resolveSessionContext(pathname)).toEqual({ kind: "delivery" });
  });
});

describe("buildOrderRequest", () => {
  const cart = [
    { id: "42", name: "Roll A", price: 3500, quantity: 2 },
    { id: 7, name: "Gyozas", price: 4500, quantity: 1 },
  ];

  it("sends only ids and quantities with the table token", () => {
    expect(buildOrderRequest(cart, { kind: "table", token: "a1b2c3" })).toEqual({
      items: [
        { id: "42", quantity: 2 },
        { id: 7, quantity: 1 },
      ],
      is_delivery: false,
      token: "a1b2c3",
    });
  });

  it("marks delivery orders and sends a null token", () => {
    expect(buildOrderRequest(cart, { kind: "delivery" })).toEqual({
      items: [
        { id: "42", quantity: 2 },
        { id: 7, quantity: 1 },
      ],
      is_delivery: true,
      token: null,
    });
  });
});
