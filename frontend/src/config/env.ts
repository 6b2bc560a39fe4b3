export type LogLevel = "debug" | "info" | "warn" | "error";

const DEFAULT_CREATE_ORDER_PATH = "/create_order";
const DEFAULT_CART_STORAGE_KEY = "mesaqr_cart";
const DEFAULT_LOCALE = "es-CL";
const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

const defaultLogLevel: LogLevel = import.meta.env.MODE === "test" ? "warn" : (import.meta.env.DEV ? "debug" : "warn");
const configuredLogLevel = (import.meta.env.VITE_LOG_LEVEL || defaultLogLevel).toLowerCase();

export const env = {
  apiBaseUrl: import.meta.env.VITE_API_BASE_URL ?? "",
  createOrderPath: import.meta.env.VITE_CREATE_ORDER_PATH || DEFAULT_CREATE_ORDER_PATH,
  cartStorageKey: import.meta.env.VITE_CART_STORAGE_KEY || DEFAULT_CART_STORAGE_KEY,
  locale: import.meta.env.VITE_LOCALE || DEFAULT_LOCALE,
  logLevel: isLogLevel(configuredLogLevel) ? configuredLogLevel : "warn",
} as const;
