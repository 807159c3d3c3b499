import { defineConfig } from 'vitest/config';
import { loadEnv } from 'vite';

export default defineConfig(({ mode }) => ({
  test: {
    globals: true,
    environment: 'node',
    include: ['test/**/*.test.ts'],
    testTimeout: 30000,
    env: {
      ...loadEnv(mode, process.cwd(), ''),
      NODE_ENV: 'test',
      PORT: '0',
      DATABASE_URL: 'postgres://localhost:5432/registration_test',
      CORS_ORIGIN: 'http://localhost:3000',
      UPLOAD_MAX_SIZE: '5242880',
      ADMIN_PASSWORD: 'test-admin-password',
      SCORING_PASSWORD: 'test-scoring-password',
      MINIO_ENDPOINT: 'http://localhost:9000',
      MINIO_ROOT_USER: 'test-user',
      MINIO_ROOT_PASSWORD: 'test-secret',
      MINIO_BUCKET: 'registration-test',
      EVENT_CONFIG_PATH: 'test/fixtures/event.json',
      NOTIFICATIONS_ENABLED: 'false',
      LOG_LEVEL: 'silent',
    },
  },
}));
