import { z } from "zod";

import { messages } from "../i18n/messages";
import { createLogger } from "../logging/logger";
import type { OrderRequest } from "../orders/request";
import { postJson } from "./client";
import { readApiError } from "./errors";

const logger = createLogger("api");

const createOrderResponseSchema = z.object({
  success: z.boolean(),
  error: z.string().nullish(),
  redirect_url: z.string().nullish(),
});

export type CreateOrderResult =
  | { ok: true; redirectUrl: string | null }
  | { ok: false; reason: "transport" | "rejected"; message: string };

/**
 * Posts an order to the order-creation endpoint.
 *
 * A non-2xx status is reported as a transport failure, a 2xx body with
 * `success: false` as a rejection. Network errors propagate to the caller.
 */
export async function createOrder(request: OrderRequest, path: string): Promise<CreateOrderResult> {
  const response = await postJson(path, request);

  if (!response.ok) {
    return {
      ok: false,
      reason: "transport",
      message: await readApiError(response, messages.orderFailed),
    };
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch (error) {
    logger.error("order response is not json", { path, status: response.status, error });
    return { ok: false, reason: "transport", message: messages.orderFailed };
  }

  const parsed = createOrderResponseSchema.safeParse(body);
  if (!parsed.success) {
    logger.error("order response has unexpected shape", { path, issues: parsed.error.issues });
    return { ok: false, reason: "rejected", message: messages.orderFailed };
  }

  if (!parsed.data.success) {
    return { ok: false, reason: "rejected", message: parsed.data.error || messages.orderFailed };
  }

  return { ok: true, redirectUrl: parsed.data.redirect_url || null };
}
