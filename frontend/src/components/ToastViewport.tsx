import { useSyncExternalStore } from "react";

import type { ToastCenter, ToastKind } from "../notifications/toasts";

const TOAST_CLASSES: Record<ToastKind, string> = {
  success: "bg-green-600 text-white",
  error: "bg-red-600 text-white",
  warning: "bg-yellow-300 text-slate-900",
  info: "bg-sky-600 text-white",
};

export function ToastViewport({ center }: { center: ToastCenter }) {
  const toasts = useSyncExternalStore(center.subscribe, center.getSnapshot, center.getSnapshot);

  if (toasts.length === 0) {
    return null;
  }

  return (
    <div className="fixed bottom-0 right-0 z-[70] space-y-2 p-3">
      {toasts.map((toast) => (
        <div
          key={toast.id}
          role="alert"
          aria-live="assertive"
          data-kind={toast.kind}
          className={`flex items-center gap-3 rounded px-3 py-2 text-sm shadow-lg ${TOAST_CLASSES[toast.kind]}`}
        >
          <span>{toast.message}</span>
          <button
            type="button"
            className="ml-auto text-xs opacity-80"
            aria-label="Cerrar aviso"
            onClick={() => center.dismiss(toast.id)}
          >
            ×
          </button>
        </div>
      ))}
    </div>
  );
}
