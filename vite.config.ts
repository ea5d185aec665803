import { defineConfig } from 'vite'
import react from '@vitejs/plugin-react'
import { fileURLToPath } from 'node:url'

// Library build: one ES module, React and the motion stack left to the host app
export default defineConfig({
  plugins: [react()],
  build: {
    target: 'es2020',
    lib: {
      entry: fileURLToPath(new URL('./src/index.ts', import.meta.url)),
      name: 'QuizWidgets',
      fileName: () => 'quiz-widgets.js',
      formats: ['es'],
    },
    rollupOptions: {
      external: ['react', 'react-dom', 'react/jsx-runtime', 'framer-motion', 'clsx', 'zod'],
    },
    emptyOutDir: true,
  },
})
