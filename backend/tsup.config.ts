import { defineConfig } from 'tsup';

export default defineConfig({
  entry: {
    'handlers/api': 'src/handlers/api.ts',
    'handlers/etl': 'src/handlers/etl.ts',
  },
  format: ['esm'],
  target: 'node20',
  platform: 'node',
  sourcemap: true,
  clean: true,
  dts: false, // Skip dts for Lambda handlers
  external: ['@aws-sdk/client-dynamodb', '@aws-sdk/client-s3', '@aws-sdk/lib-dynamodb'],
  noExternal: ['@pathimpact/shared'],
  minify: false,
  splitting: false,
});
