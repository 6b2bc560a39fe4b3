import { createContext, useContext, useEffect, useMemo, useState, type ReactNode } from "react";

import type { Notifier } from "../notifications/toasts";
import type { CartManager } from "./manager";
import type { Cart } from "./schema";
import { renderCart, type CartView } from "./view";

type CartContextValue = {
  cart: Cart;
  view: CartView;
  manager: CartManager;
  notifier: Notifier;
};

const CartContext = createContext<CartContextValue | null>(null);

export function CartProvider({
  manager,
  notifier,
  children,
}: {
  manager: CartManager;
  notifier: Notifier;
  children: ReactNode;
}) {
  const [cart, setCart] = useState<Cart>(() => manager.getCart());

  useEffect(() => {
    const refresh = () => setCart(manager.getCart());
    const unsubscribe = manager.subscribe(refresh);
    const onStorage = (event: StorageEvent) => {
      if (event.key === null || event.key === manager.storageKey) {
        refresh();
      }
    };
    window.addEventListener("storage", onStorage);
    refresh();
    return () => {
      unsubscribe();
      window.removeEventListener("storage", onStorage);
    };
  }, [manager]);

  const value = useMemo<CartContextValue>(
    () => ({ cart, view: renderCart(cart), manager, notifier }),
    [cart, manager, notifier]
  );

  return <CartContext.Provider value={value}>{children}</CartContext.Provider>;
}

export function useCart(): CartContextValue {
  const context = useContext(CartContext);
  if (!context) {
    throw new Error("useCart must be used within CartProvider");
  }
  return context;
}
