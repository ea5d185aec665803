import { act, renderHook } from '@testing-library/react';
import { describe, test, expect, afterEach } from 'vitest';
import useViewportWidth from '../hooks/useViewportWidth';

const initialWidth = window.innerWidth;

function setWidth(value: number) {
  Object.defineProperty(window, 'innerWidth', { configurable: true, writable: true, value });
}

describe('useViewportWidth', () => {
  afterEach(() => {
    setWidth(initialWidth);
  });

  test('reads the current width', () => {
    const { result } = renderHook(() => useViewportWidth());
    expect(result.current).toBe(window.innerWidth);
  });

  test('follows resizes', () => {
    const { result } = renderHook(() => useViewportWidth());
    act(() => {
      setWidth(500);
      window.dispatchEvent(new Event('resize'));
    });
    expect(result.current).toBe(500);
  });
});
