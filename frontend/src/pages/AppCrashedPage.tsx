export function AppCrashedPage({ onRetry }: { onRetry: () => void }) {
  return (
    <section className="fixed bottom-6 right-6 z-40 w-full max-w-sm rounded-xl border bg-white p-6 text-center shadow">
      <h2 className="text-lg font-bold">No pudimos mostrar tu carrito</h2>
      <p className="mt-2 text-sm text-slate-600">
        Tus productos siguen guardados. Intenta de nuevo o recarga la página.
      </p>
      <div className="mt-4 flex items-center justify-center gap-2">
        <button type="button" className="rounded bg-blue-600 px-6 py-2 text-white" onClick={onRetry}>
          Reintentar
        </button>
        <button type="button" className="rounded bg-slate-200 px-6 py-2" onClick={() => window.location.reload()}>
          Recargar
        </button>
      </div>
    </section>
  );
}
