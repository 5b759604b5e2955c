import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['test/**/*.test.ts'],
    environment: 'node',
    server: {
      deps: {
        // clipanion 3.x ships an ESM build with a bare directory import
        // (`./platform`) that Node's ESM loader rejects; let Vite resolve it.
        inline: ['clipanion'],
      },
    },
  },
});
