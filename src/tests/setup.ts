import '@testing-library/jest-dom/vitest';
import { afterEach } from 'vitest';
import { resetWidgetConfig } from '../config/runtime';

afterEach(() => {
  resetWidgetConfig();
});
