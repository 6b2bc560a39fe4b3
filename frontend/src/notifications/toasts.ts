export type ToastKind = "success" | "error" | "warning" | "info";

export type Toast = {
  id: number;
  kind: ToastKind;
  message: string;
};

export type Notifier = Record<ToastKind, (message: string) => void>;

export const TOAST_DURATION_MS: Record<ToastKind, number> = {
  success: 3000,
  error: 4000,
  warning: 3500,
  info: 3000,
};

type ToastListener = () => void;

/**
 * Holds the visible toasts and expires them. Shaped for
 * `useSyncExternalStore`: `getSnapshot` returns a new array only on change.
 */
export class ToastCenter implements Notifier {
  private toasts: readonly Toast[] = [];
  private nextId = 1;
  private readonly listeners = new Set<ToastListener>();
  private readonly timers = new Map<number, ReturnType<typeof setTimeout>>();

  public constructor(private readonly durations: Record<ToastKind, number> = TOAST_DURATION_MS) {}

  public show(message: string, kind: ToastKind = "info", durationMs: number = this.durations[kind]): number {
    const id = this.nextId++;
    this.toasts = [...this.toasts, { id, kind, message }];
    this.timers.set(
      id,
      setTimeout(() => this.dismiss(id), durationMs)
    );
    this.emit();
    return id;
  }

  public success = (message: string): void => {
    this.show(message, "success");
  };

  public error = (message: string): void => {
    this.show(message, "error");
  };

  public warning = (message: string): void => {
    this.show(message, "warning");
  };

  public info = (message: string): void => {
    this.show(message, "info");
  };

  public dismiss = (id: number): void => {
    const timer = this.timers.get(id);
    if (timer !== undefined) {
      clearTimeout(timer);
      this.timers.delete(id);
    }
    if (!this.toasts.some((toast) => toast.id === id)) {
      return;
    }
    this.toasts = this.toasts.filter((toast) => toast.id !== id);
    this.emit();
  };

  public getSnapshot = (): readonly Toast[] => this.toasts;

  public subscribe = (listener: ToastListener): (() => void) => {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  };

  private emit(): void {
    for (const listener of [...this.listeners]) {
      listener();
    }
  }
}
