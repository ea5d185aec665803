import { describe, test, expect } from 'vitest';
import {
  configureWidgets,
  getWidgetConfig,
  resetWidgetConfig,
  resolveWidgetConfig,
} from '../config/runtime';
import { WidgetConfigError } from '../utils/errors';

const DEFAULTS = {
  bounds: { opacity: { min: 0, max: 1 }, scale: { min: 0.5, max: 1.5 } },
  parallax: { speed: 1, scaleSpeed: 0.2 },
  motion: { optionMs: 220, progressMs: 260 },
  logging: { enabled: true },
};

describe('resolveWidgetConfig', () => {
  test('fills every default', () => {
    expect(resolveWidgetConfig({})).toEqual(DEFAULTS);
    expect(resolveWidgetConfig(undefined)).toEqual(DEFAULTS);
  });

  test('merges partial overrides with defaults', () => {
    const cfg = resolveWidgetConfig({ bounds: { scale: { min: 0.8, max: 1.2 } } });
    expect(cfg.bounds.scale).toEqual({ min: 0.8, max: 1.2 });
    expect(cfg.bounds.opacity).toEqual({ min: 0, max: 1 });
  });

  test('rejects an inverted clamp range', () => {
    try {
      resolveWidgetConfig({ bounds: { scale: { min: 2, max: 1 } } });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(WidgetConfigError);
      if (err instanceof WidgetConfigError) {
        expect(err.issues).toEqual(['bounds.scale: min must not exceed max']);
      }
    }
  });

  test('rejects opacity bounds outside [0, 1] and a non-positive scale floor', () => {
    try {
      resolveWidgetConfig({ bounds: { opacity: { min: -1, max: 2 }, scale: { min: -1, max: 3 } } });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(WidgetConfigError);
      if (err instanceof WidgetConfigError) {
        expect(err.issues).toEqual([
          'bounds.opacity.min: Number must be greater than or equal to 0',
          'bounds.opacity.max: Number must be less than or equal to 1',
          'bounds.scale.min: Number must be greater than 0',
        ]);
      }
    }
  });

  test('configureWidgets refuses a zero scale floor and keeps the previous config', () => {
    expect(() => configureWidgets({ bounds: { scale: { min: 0, max: 1 } } })).toThrow(WidgetConfigError);
    expect(getWidgetConfig().bounds.scale).toEqual({ min: 0.5, max: 1.5 });
  });

  test('rejects negative durations', () => {
    expect(() => resolveWidgetConfig({ motion: { optionMs: -5 } })).toThrow(/motion\.optionMs: /);
  });
});

describe('widget config cache', () => {
  test('defaults until configured', () => {
    expect(getWidgetConfig()).toEqual(DEFAULTS);
  });

  test('configureWidgets replaces the cached config until reset', () => {
    const cfg = configureWidgets({ motion: { progressMs: 400 } });
    expect(getWidgetConfig()).toBe(cfg);
    expect(getWidgetConfig().motion.progressMs).toBe(400);

    resetWidgetConfig();
    expect(getWidgetConfig().motion.progressMs).toBe(260);
  });
});
