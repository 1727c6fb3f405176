import { create } from 'zustand';

export type ToastVariant = 'default' | 'success' | 'warning' | 'danger';

export type ToastPayload = {
  message: string;
  variant?: ToastVariant;
  durationMs?: number;
  actionLabel?: string;
  onAction?: () => void;
};

export type ToastState = {
  /** Bumped on every toast shown, so hosts can re-trigger the same message. */
  id: number;
  message: string;
  variant: ToastVariant;
  durationMs: number;
  actionLabel?: string;
  onAction?: () => void;
  showToast: (payload: ToastPayload) => void;
  clearToast: () => void;
};

const DEFAULT_DURATION_MS = 3000;

// A new toast replaces the visible one; the host dismisses it with clearToast.
export const useToastStore = create<ToastState>((set) => ({
  id: 0,
  message: '',
  variant: 'default',
  durationMs: DEFAULT_DURATION_MS,
  actionLabel: undefined,
  onAction: undefined,

  showToast: ({ message, variant = 'default', durationMs = DEFAULT_DURATION_MS, actionLabel, onAction }) =>
    set((prev) => {
      const trimmed = message.trim();
      if (!trimmed) return prev;
      return { id: prev.id + 1, message: trimmed, variant, durationMs, actionLabel, onAction };
    }),

  clearToast: () => set({ message: '', actionLabel: undefined, onAction: undefined }),
}));
