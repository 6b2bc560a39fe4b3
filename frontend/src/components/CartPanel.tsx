import type { CartItemId } from "../cart/schema";
import type { CartView } from "../cart/view";
import { messages } from "../i18n/messages";

type CartPanelProps = {
  view: CartView;
  disabled?: boolean;
  onChangeQuantity: (id: CartItemId, quantity: number) => void;
  onRemove: (id: CartItemId) => void;
};

export function CartPanel({ view, disabled = false, onChangeQuantity, onRemove }: CartPanelProps) {
  if (view.isEmpty) {
    return <p className="p-3 text-center text-sm text-slate-500">{messages.cartEmptyState}</p>;
  }

  return (
    <ul className="space-y-2" aria-label="Productos en el carrito">
      {view.lines.map((line) => (
        <li key={line.key} className="flex items-center justify-between rounded border p-2">
          <div>
            <p className="text-sm font-medium">{line.name}</p>
            <div className="mt-2 flex items-center gap-2">
              <button
                type="button"
                className="inline-flex h-7 w-7 items-center justify-center rounded border border-slate-300 bg-slate-100 font-semibold"
                aria-label={`Disminuir ${line.name}`}
                disabled={disabled}
                onClick={() => onChangeQuantity(line.id, line.quantity - 1)}
              >
                -
              </button>
              <span className="min-w-6 text-center text-sm font-semibold" data-testid={`quantity-${line.key}`}>
                {line.quantity}
              </span>
              <button
                type="button"
                className="inline-flex h-7 w-7 items-center justify-center rounded border border-slate-300 bg-slate-100 font-semibold"
                aria-label={`Aumentar ${line.name}`}
                disabled={disabled}
                onClick={() => onChangeQuantity(line.id, line.quantity + 1)}
              >
                +
              </button>
            </div>
            <small className="text-slate-500">{line.detailLabel}</small>
          </div>
          <button
            type="button"
            className="rounded border border-red-300 px-2 py-1 text-sm text-red-700"
            aria-label={`Eliminar ${line.name}`}
            disabled={disabled}
            onClick={() => onRemove(line.id)}
          >
            Eliminar
          </button>
        </li>
      ))}
    </ul>
  );
}
