/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_API_BASE_URL?: string;
  readonly VITE_CREATE_ORDER_PATH?: string;
  readonly VITE_CART_STORAGE_KEY?: string;
  readonly VITE_LOCALE?: string;
  readonly VITE_LOG_LEVEL?: string;
}

interface ImportMeta {
  readonly env: ImportMetaEnv;
}
