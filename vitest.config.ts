import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    mockReset: true,
    include: ['src/**/*.test.ts', 'test/**/*.test.ts'],
    coverage: {
      reporter: ['text'],
      include: ['src/**/*.ts'],
      exclude: ['src/**/*.{schema,types,error,const}.ts', 'src/gridlab.ts'],
    },
  },
  resolve: {
    alias: {
      '@constants': path.resolve(root, './src/constants'),
      '@models': path.resolve(root, './src/models'),
      '@errors': path.resolve(root, './src/errors'),
      '@utils': path.resolve(root, './src/utils'),
      '@services': path.resolve(root, './src/services'),
    },
  },
});
