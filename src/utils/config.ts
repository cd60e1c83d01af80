import { z } from 'zod';
import { config as loadDotenv } from 'dotenv';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';

const __dirname = dirname(fileURLToPath(import.meta.url));
const PROJECT_ROOT = resolve(__dirname, '../..');

loadDotenv({ path: resolve(PROJECT_ROOT, '.env') });

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  // Store backend
  STORE_DIALECT: z.enum(['memory', 'sqlite', 'postgres']).default('sqlite'),
  SQLITE_PATH: z.string().default('data/safety-circle.db'),
  DATABASE_URL: z.string().optional(),
  POSTGRES_SSL: booleanFlag,
  POSTGRES_SSL_REJECT_UNAUTHORIZED: z
    .enum(['true', 'false', '1', '0'])
    .default('true')
    .transform((value) => value === 'true' || value === '1'),

  // Coordination timing
  SETTLE_DELAY_MS: z.coerce.number().int().min(0).max(60_000).default(500),
  STATUS_RESET_MINUTES: z.coerce.number().int().min(1).max(24 * 60).default(60),
  ADMIN_CANCEL_HOURS: z.coerce.number().min(0).max(24 * 30).default(24),

  // Health endpoint
  HEALTH_PORT: z.coerce.number().int().min(0).max(65_535).default(3001),
  HEALTH_BIND_HOST: z.string().default('127.0.0.1'),
  HEALTH_ONLY: booleanFlag,

  // Infrastructure
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('❌ Invalid environment variables:');
  for (const issue of parsed.error.issues) {
    console.error(`   ${issue.path.join('.')}: ${issue.message}`);
  }
  process.exit(1);
}

if (parsed.data.STORE_DIALECT === 'postgres' && !parsed.data.DATABASE_URL) {
  console.error('❌ DATABASE_URL is required when STORE_DIALECT=postgres');
  process.exit(1);
}

export type AppConfig = z.infer<typeof envSchema>;

export const config: AppConfig = {
  ...parsed.data,
  SQLITE_PATH: parsed.data.SQLITE_PATH === ':memory:' || parsed.data.SQLITE_PATH.startsWith('/')
    ? parsed.data.SQLITE_PATH
    : resolve(PROJECT_ROOT, parsed.data.SQLITE_PATH),
};
export { PROJECT_ROOT };
