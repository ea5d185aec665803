import { defineConfig } from "vitest/config";
import react from "@vitejs/plugin-react";

// Reuses the Vite React plugin and renders into jsdom so React Testing
// Library can mount the widgets. The setup file adds the jest-dom matchers
// and resets the widget config between tests.
export default defineConfig({
  plugins: [react()],
  test: {
    environment: "jsdom",
    globals: true,
    include: ["src/tests/**/*.test.{ts,tsx}"],
    setupFiles: "src/tests/setup.ts",
  },
});
