import { MOOD_SCALE, averageMoodValue, getMoodOption } from './mood';

describe('mood scale', () => {
  test('runs worst to best', () => {
    expect(MOOD_SCALE.map((option) => option.value)).toEqual([1, 2, 3, 4, 5]);
    expect(getMoodOption('neutral').description).toBe('Okay');
  });

  test('averages mood values', () => {
    expect(averageMoodValue([])).toBeNull();
    expect(averageMoodValue(['good', 'excellent', 'neutral'])).toBe(4);
  });
});
