import { useState } from "react";
import { useLocation } from "react-router-dom";

import { createOrder } from "../api/orders";
import { useCart } from "../cart/CartContext";
import { env } from "../config/env";
import { messages } from "../i18n/messages";
import { submitOrder } from "../orders/submit";
import { CartPanel } from "./CartPanel";

type CartWidgetProps = {
  createOrderPath?: string;
  redirect?: (url: string) => void;
};

export function CartWidget({ createOrderPath = env.createOrderPath, redirect }: CartWidgetProps) {
  const location = useLocation();
  const { view, manager, notifier } = useCart();
  const [isCartOpen, setIsCartOpen] = useState(false);
  const [isSubmitting, setIsSubmitting] = useState(false);

  const onSubmit = () => {
    void submitOrder({
      manager,
      notifier,
      pathname: location.pathname,
      loading: {
        start: () => setIsSubmitting(true),
        stop: () => setIsSubmitting(false),
      },
      send: (request) => createOrder(request, createOrderPath),
      onSubmitted: () => setIsCartOpen(false),
      redirect,
    });
  };

  return (
    <>
      <button
        type="button"
        className="fixed bottom-6 right-6 z-40 flex h-12 w-12 items-center justify-center rounded-full bg-slate-900 text-xl text-white shadow-lg"
        aria-label="Ver carrito"
        aria-expanded={isCartOpen}
        onClick={() => setIsCartOpen((prev) => !prev)}
      >
        🛒
        <span
          className="absolute -right-1 -top-1 rounded-full bg-red-600 px-1.5 text-xs text-white"
          data-testid="cart-count"
        >
          {view.itemCount}
        </span>
      </button>

      <aside
        aria-label="Carrito"
        hidden={!isCartOpen}
        className="fixed right-0 top-0 z-30 h-full w-[22rem] bg-white p-4 shadow-2xl"
      >
        <div className="mb-3 flex items-center justify-between">
          <h2 className="text-lg font-semibold">Tu pedido</h2>
          <button
            type="button"
            className="rounded bg-slate-200 px-2 py-1 text-sm"
            onClick={() => setIsCartOpen(false)}
          >
            Ocultar
          </button>
        </div>

        <CartPanel
          view={view}
          disabled={isSubmitting}
          onChangeQuantity={(id, quantity) => manager.updateQuantity(id, quantity)}
          onRemove={(id) => manager.removeItem(id)}
        />

        <p className="mt-4 flex items-center justify-between border-t border-slate-200 pt-3 font-semibold">
          <span>Total</span>
          <span>
            $<span data-testid="cart-total">{view.totalLabel}</span>
          </span>
        </p>

        <div className="mt-4 flex gap-2">
          <button
            type="button"
            className="rounded bg-green-600 px-3 py-2 text-white disabled:cursor-not-allowed disabled:bg-slate-300"
            disabled={isSubmitting}
            onClick={onSubmit}
          >
            {isSubmitting ? (
              <>
                <span className="mr-2 inline-block h-3 w-3 animate-spin rounded-full border-2 border-white border-t-transparent" role="status" aria-hidden="true" />
                {messages.submitting}
              </>
            ) : (
              messages.submit
            )}
          </button>
          {!view.isEmpty ? (
            <button
              type="button"
              className="rounded bg-slate-300 px-3 py-2 disabled:opacity-50"
              disabled={isSubmitting}
              onClick={() => manager.clearCart()}
            >
              Vaciar carrito
            </button>
          ) : null}
        </div>
      </aside>
    </>
  );
}
