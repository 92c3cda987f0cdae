// src/config/env.ts

import { z } from 'zod';
import dotenv from 'dotenv';
import path from 'path';

// Load environment variables from project root, not process.cwd()
dotenv.config({ path: path.resolve(__dirname, '../../.env') });

/**
 * Environment Variable Schema
 * Numeric settings arrive as strings and are coerced.
 */
const envSchema = z.object({
    // Server & Environment
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),

    // Transport
    RPC_SOCKET_PATH: z.string().min(1).default('/run/logic/logic.sock'),
    RPC_MAX_FRAME_BYTES: z.coerce.number().int().min(1).max(0xffffffff).default(16 * 1024 * 1024),

    // Serve loop
    RPC_RESTART_BACKOFF_MS: z.coerce.number().int().min(0).default(1000),
    RPC_DRAIN_TIMEOUT_MS: z.coerce.number().int().min(0).default(5000),

    // Blocking handler workers
    RPC_BLOCKING_WORKERS: z.coerce.number().int().min(1).max(64).default(2),
    RPC_BLOCKING_TIMEOUT_MS: z.coerce.number().int().min(1).default(30000),
});

export type Env = z.infer<typeof envSchema>;

// Process and validate
const _env = envSchema.parse(process.env);

export const ENV: Env = _env;
