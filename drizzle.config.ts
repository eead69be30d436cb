import { defineConfig } from 'drizzle-kit';

export default defineConfig({
  schema: ['./src/db/schema/staging.ts', './src/db/schema/monitoring.ts'],
  out: './drizzle',
  dialect: 'postgresql',
  dbCredentials: {
    url: process.env.DATABASE_URL ?? '',
  },
  verbose: true,
  strict: true,
});
