import { z } from 'zod';
import dotenv from 'dotenv';
import { ValidationException } from '../utils/exceptions';

// Load environment variables
dotenv.config();

const positiveInt = (fallback: number) =>
  z
    .string()
    .optional()
    .transform((val) => (val ? parseInt(val, 10) : fallback))
    .pipe(z.number().int().positive());

const envSchema = z.object({
  // Database
  DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),

  // Server
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z
    .string()
    .default('5000')
    .transform((val) => parseInt(val, 10)),

  // Frontend origins allowed by CORS
  FRONTEND_URL: z.string().url().optional(),
  // Additional frontend URLs (comma-separated)
  FRONTEND_URLS: z.string().optional(),

  // Logging
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  // Redis (optional, enables the draft cache and shared rate limits)
  REDIS_HOST: z.string().optional(),
  REDIS_PORT: z.string().optional(),
  REDIS_PASSWORD: z.string().optional(),
  REDIS_DB: z.string().optional(),

  // Database Connection Pool
  DB_POOL_SIZE: positiveInt(10),

  // How long fetched draft rows stay cached
  CACHE_TTL_SECONDS: positiveInt(3600),

  // Rows per page when assembling result sets
  FETCH_PAGE_SIZE: positiveInt(1000),
});

// Parse and validate environment variables
const parseEnv = () => {
  try {
    return envSchema.parse(process.env);
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error('❌ Environment validation failed:');
      error.issues.forEach((issue) => {
        console.error(`  - ${issue.path.join('.')}: ${issue.message}`);
      });
      throw new ValidationException('Invalid environment configuration');
    }
    throw error;
  }
};

// Export validated environment variables
export const env = parseEnv();
