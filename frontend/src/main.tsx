import ReactDOM from "react-dom/client";
import { BrowserRouter } from "react-router-dom";

import App from "./App";
import { CartManager } from "./cart/manager";
import { CartStore, resolveBrowserStorage } from "./cart/store";
import { bindAddToCartTriggers } from "./cart/triggers";
import { AppErrorBoundary } from "./components/AppErrorBoundary";
import { logger } from "./logging/logger";
import { ToastCenter } from "./notifications/toasts";
import "./index.css";

const toasts = new ToastCenter();
const manager = new CartManager({ store: new CartStore(resolveBrowserStorage()), notifier: toasts });

bindAddToCartTriggers(document, manager);

const mountPoint = document.getElementById("cart-root");
if (mountPoint) {
  ReactDOM.createRoot(mountPoint).render(
    <AppErrorBoundary>
      <BrowserRouter>
        <App manager={manager} toasts={toasts} createOrderPath={mountPoint.dataset.createOrderUrl} />
      </BrowserRouter>
    </AppErrorBoundary>
  );
} else {
  logger.warn("cart mount point #cart-root not found, cart panel disabled");
}
