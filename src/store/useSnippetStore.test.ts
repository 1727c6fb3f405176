import { createHabit } from '../domain/habits';
import { createSnippet } from '../domain/snippets';
import { getActiveStateStorage, persistKey } from './storage';
import { useSnippetStore } from './useSnippetStore';

function snippet(name: string, createdAt: string) {
  return createSnippet(name, [createHabit({ name: 'Water', type: { kind: 'checkbox' } })], createdAt);
}

describe('useSnippetStore', () => {
  beforeEach(() => {
    useSnippetStore.getState().resetStore();
  });

  test('lists snippets newest first', () => {
    const older = snippet('Wake up', '2026-01-01T07:00:00.000Z');
    const newer = snippet('Wind down', '2026-02-01T07:00:00.000Z');
    useSnippetStore.getState().saveSnippet(older);
    useSnippetStore.getState().saveSnippet(newer);

    expect(useSnippetStore.getState().getAllSnippets().map((s) => s.name)).toEqual(['Wind down', 'Wake up']);
  });

  test('searches names case-insensitively', () => {
    useSnippetStore.getState().saveSnippet(snippet('Wake up', '2026-01-01T07:00:00.000Z'));
    useSnippetStore.getState().saveSnippet(snippet('Wind down', '2026-02-01T07:00:00.000Z'));

    expect(useSnippetStore.getState().searchSnippets('  WAKE ').map((s) => s.name)).toEqual(['Wake up']);
    expect(useSnippetStore.getState().searchSnippets('w').map((s) => s.name)).toEqual(['Wind down', 'Wake up']);
    expect(useSnippetStore.getState().searchSnippets('')).toHaveLength(2);
    expect(useSnippetStore.getState().searchSnippets('gym')).toEqual([]);
  });

  test('updates and deletes by id', () => {
    const saved = snippet('Wake up', '2026-01-01T07:00:00.000Z');
    useSnippetStore.getState().saveSnippet(saved);
    useSnippetStore.getState().updateSnippet({ ...saved, name: 'Rise' });
    expect(useSnippetStore.getState().snippets.map((s) => s.name)).toEqual(['Rise']);

    useSnippetStore.getState().deleteSnippet(saved.id);
    expect(useSnippetStore.getState().snippets).toEqual([]);
  });

  test('persists snippets under its key', async () => {
    const saved = snippet('Wake up', '2026-01-01T07:00:00.000Z');
    useSnippetStore.getState().saveSnippet(saved);

    const raw = await getActiveStateStorage().getItem(persistKey('snippets'));
    expect(typeof raw).toBe('string');
    const stored: unknown = JSON.parse(String(raw));
    expect(stored).toEqual({ state: { snippets: [saved] }, version: 0 });
  });
});
