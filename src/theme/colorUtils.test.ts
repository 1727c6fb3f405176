import { hexToRgba, isValidHexColor, parseHexColor, resolveHabitColor } from './colorUtils';

describe('parseHexColor', () => {
  test('reads 3, 6 and 8 digit forms', () => {
    expect(parseHexColor('#FFF')).toEqual({ r: 255, g: 255, b: 255, a: 1 });
    expect(parseHexColor('#007AFF')).toEqual({ r: 0, g: 122, b: 255, a: 1 });
    expect(parseHexColor('80FF0000')).toEqual({ r: 255, g: 0, b: 0, a: 128 / 255 });
  });

  test('rejects anything else', () => {
    expect(parseHexColor('#12345')).toBeNull();
    expect(parseHexColor('blue')).toBeNull();
    expect(isValidHexColor('')).toBe(false);
  });
});

describe('resolveHabitColor', () => {
  test('trims valid colours and falls back to blue', () => {
    expect(resolveHabitColor(' #34C759 ')).toBe('#34C759');
    expect(resolveHabitColor('not-a-colour')).toBe('#007AFF');
    expect(resolveHabitColor(null)).toBe('#007AFF');
  });
});

describe('hexToRgba', () => {
  test('applies a clamped alpha', () => {
    expect(hexToRgba('#007AFF', 0.5)).toBe('rgba(0,122,255,0.5)');
    expect(hexToRgba('nope', 2)).toBe('rgba(0,0,0,1)');
  });
});
