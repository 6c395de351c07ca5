import { fileURLToPath } from 'url';
import { defineConfig } from 'vitest/config';

const fromRoot = (dir: string) => fileURLToPath(new URL(dir, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@adapter': fromRoot('./src/Adapter'),
      '@diagnostics': fromRoot('./src/Diagnostics'),
      '@messaging': fromRoot('./src/Messaging'),
      '@mqtt': fromRoot('./src/MQTT'),
      '@utils': fromRoot('./src/Utils'),
    },
  },
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
  },
});
