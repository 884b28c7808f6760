import { z } from 'zod';
import dotenv from 'dotenv';
import path from 'path';

dotenv.config({ path: path.resolve(process.cwd(), '.env') });

const apiKey = (name: string) => z.string().trim().min(1, `${name} is required`);

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().default(4000),

  // Google Maps Platform (geocoding + places)
  GOOGLE_API_KEY: apiKey('GOOGLE_API_KEY'),
  GEOCODE_URL: z.string().url().default('https://maps.googleapis.com/maps/api/geocode/json'),
  PLACES_URL: z.string().url().default('https://places.googleapis.com/v1/places:searchText'),
  DEFAULT_COUNTRY: z.string().trim().min(1).default('USA'),

  // Vision model (map screenshots)
  AI_STUDIO_KEY: apiKey('AI_STUDIO_KEY'),
  VISION_MODEL: z.string().default('gemini-2.5-flash'),

  // Verdict model (OpenAI-compatible chat completions)
  GROQ_API_KEY: apiKey('GROQ_API_KEY'),
  CHAT_BASE_URL: z.string().url().default('https://api.groq.com/openai/v1'),
  VERDICT_MODEL: z.string().default('llama-3.3-70b-versatile'),
  MODEL_TIMEOUT_MS: z.coerce.number().int().positive().default(20_000),

  // 0 = one task per candidate, all at once
  VERIFY_MAX_CONCURRENCY: z.coerce.number().int().min(0).default(0),

  // Zone cache
  REDIS_URL: z.string().optional(),
  CACHE_TTL_SECONDS: z.coerce.number().default(3600),

  // Rate limiting
  RATE_LIMIT_WINDOW_MS: z.coerce.number().default(60_000),
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().default(30),

  // CORS
  CORS_ORIGIN: z.string().default('http://localhost:3000'),
});

export type Env = z.infer<typeof envSchema>;

function loadEnv(): Env {
  const parsed = envSchema.safeParse(process.env);
  if (!parsed.success) {
    console.error('Invalid environment variables:');
    console.error(parsed.error.flatten().fieldErrors);
    process.exit(1);
  }
  return parsed.data;
}

export const env = loadEnv();
