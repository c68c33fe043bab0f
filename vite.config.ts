import { defineConfig } from 'vite';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  build: {
    lib: {
      entry: fileURLToPath(new URL('./src/index.ts', import.meta.url)),
      name: 'EhrSyncEngine',
      formats: ['es'],
      fileName: () => 'index.js',
    },
    rollupOptions: {
      external: [/^fp-ts/, /^io-ts/, /^rxjs/, 'uuid', /^node:/],
    },
    sourcemap: true,
    minify: false,
  },
});
