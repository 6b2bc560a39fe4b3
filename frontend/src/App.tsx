import type { CartManager } from "./cart/manager";
import { CartProvider } from "./cart/CartContext";
import { CartWidget } from "./components/CartWidget";
import { ToastViewport } from "./components/ToastViewport";
import type { ToastCenter } from "./notifications/toasts";

type CartAppProps = {
  manager: CartManager;
  toasts: ToastCenter;
  createOrderPath?: string;
  redirect?: (url: string) => void;
};

function CartApp({ manager, toasts, createOrderPath, redirect }: CartAppProps) {
  return (
    <CartProvider manager={manager} notifier={toasts}>
      <CartWidget createOrderPath={createOrderPath} redirect={redirect} />
      <ToastViewport center={toasts} />
    </CartProvider>
  );
}

export default CartApp;
