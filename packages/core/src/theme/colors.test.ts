import { afterEach, describe, it, expect, vi } from 'vitest';
import { COLOR_THEME_NAMES, colorThemeNameSchema, resolveThemePalette, THEME_PALETTES } from './colors.js';

describe('THEME_PALETTES', () => {
  it('should define a palette for every theme name', () => {
    expect(Object.keys(THEME_PALETTES).sort()).toEqual([...COLOR_THEME_NAMES].sort());
  });
});

describe('colorThemeNameSchema', () => {
  it('accepts built-in names and rejects others', () => {
    expect(colorThemeNameSchema.parse('forest')).toBe('forest');
    expect(() => colorThemeNameSchema.parse('neon')).toThrow();
  });
});

describe('resolveThemePalette', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should return the named palette', () => {
    expect(resolveThemePalette('ocean')).toBe(THEME_PALETTES.ocean);
  });

  it('should fall back to the default palette with a warning', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    expect(resolveThemePalette('neon')).toBe(THEME_PALETTES.default);
    expect(warn).toHaveBeenCalledWith('[theme] Unknown color theme "neon", using "default"');
  });
});
