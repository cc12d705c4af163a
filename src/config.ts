import { z } from 'zod';

const booleanFlag = z
    .enum(['true', 'false', '1', '0'])
    .transform(value => value === 'true' || value === '1');

/**
 * Environment configuration
 *
 * Every variable is optional; defaults suit local development.
 */
export const ConfigSchema = z.object({
    PORT: z.coerce.number().int().positive().default(3000),
    HOST: z.string().default('0.0.0.0'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    /** Human-readable logs through pino-pretty */
    LOG_PRETTY: booleanFlag.default('true'),
    /** Requests allowed per client and window */
    RATE_LIMIT_MAX: z.coerce.number().int().positive().default(100),
    RATE_LIMIT_WINDOW: z.string().default('1 minute'),
    /** Deadline for booking operations that allocate a resource */
    ALLOCATION_TIMEOUT_MS: z.coerce.number().int().positive().default(2000),
    /** Load the demo bays, teams and catalog at startup */
    SEED_DATA: booleanFlag.default('true'),
});

export type Config = z.infer<typeof ConfigSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
    const parsed = ConfigSchema.safeParse(env);
    if (!parsed.success) {
        throw new Error(`Invalid configuration: ${parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ')}`);
    }
    return parsed.data;
}
