import { useToastStore } from './useToastStore';

describe('useToastStore', () => {
  beforeEach(() => {
    useToastStore.getState().clearToast();
  });

  test('shows trimmed messages with defaults and ignores blanks', () => {
    const before = useToastStore.getState().id;
    useToastStore.getState().showToast({ message: '  Routine saved ' });
    useToastStore.getState().showToast({ message: '   ' });

    expect(useToastStore.getState()).toMatchObject({
      id: before + 1,
      message: 'Routine saved',
      variant: 'default',
      durationMs: 3000,
    });
  });

  test('replaces the visible toast and bumps the id', () => {
    const onAction = jest.fn();
    const { showToast } = useToastStore.getState();
    showToast({ message: 'First' });
    const firstId = useToastStore.getState().id;
    showToast({ message: 'Import failed', variant: 'danger', actionLabel: 'Retry', onAction });

    expect(useToastStore.getState()).toMatchObject({
      id: firstId + 1,
      message: 'Import failed',
      variant: 'danger',
      actionLabel: 'Retry',
    });
    useToastStore.getState().onAction?.();
    expect(onAction).toHaveBeenCalledTimes(1);
  });

  test('clears the message and action', () => {
    useToastStore.getState().showToast({ message: 'Saved', actionLabel: 'Undo', onAction: () => undefined });
    useToastStore.getState().clearToast();

    expect(useToastStore.getState().message).toBe('');
    expect(useToastStore.getState().actionLabel).toBeUndefined();
    expect(useToastStore.getState().onAction).toBeUndefined();
  });
});
