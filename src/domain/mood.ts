import type { Mood } from './types';

export type MoodOption = {
  mood: Mood;
  emoji: string;
  description: string;
  value: 1 | 2 | 3 | 4 | 5;
};

/** Ordered worst to best; the rating sheet renders them left to right. */
export const MOOD_SCALE: readonly MoodOption[] = [
  { mood: 'terrible', emoji: '😵', description: 'Terrible', value: 1 },
  { mood: 'bad', emoji: '😴', description: 'Tired', value: 2 },
  { mood: 'neutral', emoji: '😐', description: 'Okay', value: 3 },
  { mood: 'good', emoji: '😊', description: 'Good', value: 4 },
  { mood: 'excellent', emoji: '😄', description: 'Excellent', value: 5 },
];

export function getMoodOption(mood: Mood): MoodOption {
  const found = MOOD_SCALE.find((option) => option.mood === mood);
  if (!found) {
    throw new Error(`Unknown mood: ${mood}`);
  }
  return found;
}

export function averageMoodValue(moods: Mood[]): number | null {
  if (moods.length === 0) return null;
  const total = moods.reduce((sum, mood) => sum + getMoodOption(mood).value, 0);
  return total / moods.length;
}
