// src/config/types.ts
import { z } from 'zod';
import { envSchema } from './schemas';

/** Raw environment record handed to ConfigService (normally `process.env`). */
export type EnvironmentRecord = Record<string, string | undefined>;

export type AppConfig = z.infer<typeof envSchema>;

/** Required settings, present only once validation has passed. */
export interface CheckServiceSettings {
    remoteUrl: string;
    apiToken: string;
    username: string;
    clientSignature: string;
    contentDirectory: string;
}
