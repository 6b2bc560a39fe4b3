export const DELIVERY_SEGMENT = "delivery";

export type SessionContext =
  | { kind: "table"; token: string }
  | { kind: "delivery" };

/**
 * Menu pages live at `/menu/<token>` for tables and `/delivery` for delivery
 * orders. The last path segment is the table token unless it is empty or the
 * delivery sentinel.
 */
export function resolveSessionContext(pathname: string): SessionContext {
  const segments = pathname.split("/");
  const lastSegment = segments[segments.length - 1];
  if (!lastSegment || lastSegment === DELIVERY_SEGMENT) {
    return { kind: "delivery" };
  }
  return { kind: "table", token: lastSegment };
}
