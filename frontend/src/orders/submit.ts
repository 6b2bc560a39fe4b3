import { createOrder, type CreateOrderResult } from "../api/orders";
import type { CartManager } from "../cart/manager";
import { env } from "../config/env";
import { messages } from "../i18n/messages";
import { createLogger } from "../logging/logger";
import type { Notifier } from "../notifications/toasts";
import { buildOrderRequest, type OrderRequest } from "./request";
import { resolveSessionContext } from "./session";

const logger = createLogger("orders");

export type LoadingControl = {
  start: () => void;
  stop: () => void;
};

export type SubmitOrderOptions = {
  manager: CartManager;
  notifier: Notifier;
  pathname: string;
  loading: LoadingControl;
  send?: (request: OrderRequest) => Promise<CreateOrderResult>;
  onSubmitted?: () => void;
  redirect?: (url: string) => void;
};

export type SubmitOutcome =
  | { status: "empty" }
  | { status: "submitted"; redirectUrl: string | null }
  | { status: "failed"; reason: "transport" | "rejected"; message: string };

function defaultRedirect(url: string): void {
  window.location.assign(url);
}

export async function submitOrder({
  manager,
  notifier,
  pathname,
  loading,
  send = (request) => createOrder(request, env.createOrderPath),
  onSubmitted,
  redirect = defaultRedirect,
}: SubmitOrderOptions): Promise<SubmitOutcome> {
  const cart = manager.getCart();
  if (cart.length === 0) {
    notifier.warning(messages.cartEmpty);
    return { status: "empty" };
  }

  loading.start();
  const context = resolveSessionContext(pathname);
  const request = buildOrderRequest(cart, context);
  logger.info("submitting order", { context, lines: request.items.length });

  let result: CreateOrderResult;
  try {
    result = await send(request);
  } catch (error) {
    loading.stop();
    logger.error("order submission failed", { error });
    notifier.error(messages.orderFailed);
    return { status: "failed", reason: "transport", message: messages.orderFailed };
  }
  loading.stop();

  if (!result.ok) {
    logger.warn("order not accepted", { reason: result.reason, message: result.message });
    notifier.error(result.message);
    return { status: "failed", reason: result.reason, message: result.message };
  }

  notifier.success(messages.orderSent);
  manager.clearCart();
  onSubmitted?.();
  if (result.redirectUrl) {
    redirect(result.redirectUrl);
  }
  return { status: "submitted", redirectUrl: result.redirectUrl };
}
