import { defineConfig } from 'vite'
import dts from 'vite-plugin-dts'
import { fileURLToPath } from 'node:url'

const src = (file: string) => fileURLToPath(new URL(`./src/${file}`, import.meta.url))

export default defineConfig({
  plugins: [
    dts({ include: ['src'], exclude: ['src/main.ts'], rollupTypes: true })
  ],
  build: {
    target: 'node20',
    lib: {
      entry: {
        index: src('index.ts'),
        main: src('main.ts'),
      },
      formats: ['es'],
      fileName: (_format, name) => `${name}.js`
    },
    rollupOptions: {
      external: ['better-sqlite3', 'pino', 'zod', 'dotenv', /^node:/]
    }
  }
})
