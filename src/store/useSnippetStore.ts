import { create } from 'zustand';
import { createJSONStorage, persist } from 'zustand/middleware';
import type { HabitSnippet } from '../domain/types';
import { persistKey, stateStorage } from './storage';

type SnippetState = {
  snippets: HabitSnippet[];

  saveSnippet: (snippet: HabitSnippet) => void;
  updateSnippet: (snippet: HabitSnippet) => void;
  deleteSnippet: (snippetId: string) => void;
  /** Newest first. */
  getAllSnippets: () => HabitSnippet[];
  /** Case-insensitive name match, newest first. An empty query returns everything. */
  searchSnippets: (query: string) => HabitSnippet[];
  resetStore: () => void;
};

const newestFirst = (a: HabitSnippet, b: HabitSnippet) => Date.parse(b.createdAt) - Date.parse(a.createdAt);

export const useSnippetStore = create<SnippetState>()(
  persist(
    (set, get) => ({
      snippets: [],

      saveSnippet: (snippet) => set((state) => ({ snippets: [...state.snippets, snippet] })),

      updateSnippet: (snippet) =>
        set((state) => ({
          snippets: state.snippets.map((existing) => (existing.id === snippet.id ? snippet : existing)),
        })),

      deleteSnippet: (snippetId) =>
        set((state) => ({ snippets: state.snippets.filter((snippet) => snippet.id !== snippetId) })),

      getAllSnippets: () => [...get().snippets].sort(newestFirst),

      searchSnippets: (query) => {
        const needle = query.trim().toLowerCase();
        if (!needle) return get().getAllSnippets();
        return get()
          .snippets.filter((snippet) => snippet.name.toLowerCase().includes(needle))
          .sort(newestFirst);
      },

      resetStore: () => set({ snippets: [] }),
    }),
    {
      name: persistKey('snippets'),
      storage: createJSONStorage(() => stateStorage),
      partialize: (state) => ({ snippets: state.snippets }),
    },
  ),
);
