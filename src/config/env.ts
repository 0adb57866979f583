import dotenv from 'dotenv';
import { z } from 'zod';
import { DEFAULT_WEATHER_API_URL } from '../constants/weather';

// -------------------------------------------------
// Load & validate environment variables
// -------------------------------------------------
dotenv.config({
    quiet: process.env.NODE_ENV === 'test',
});

export const envSchema = z.object({
    // Placeholder default keeps local runs working without a real key
    API_KEY: z.string().min(1).default('test'),
    WEATHER_API_URL: z.string().url().default(DEFAULT_WEATHER_API_URL),
    DATABASE_URL: z.string().min(1).default('./async_users.db'),
    SERVER_PORT: z.string().regex(/^\d+$/).default('5000'),
    NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),
});

export type Env = z.infer<typeof envSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
    const parsed = envSchema.safeParse(source);

    if (!parsed.success) {
        const details = parsed.error.issues
            .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new Error(`Invalid environment configuration: ${details}`);
    }

    return parsed.data;
}
