import { z } from 'zod';
import { InfrastructureException } from '../shared/exceptions/infrastructure.exception';

const booleanFlag = z.enum(['true', 'false']).transform(val => val === 'true');

const environmentSchema = z.object({
    // Application
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    HOST: z.string().min(1).default('0.0.0.0'),
    PORT: z.string().regex(/^\d+$/, 'PORT must be a number').transform(val => parseInt(val, 10)).default('8000'),
    CORS_ORIGIN: z.string().default('*'),

    // Database - MongoDB
    MONGODB_URI: z.string().min(1).default('mongodb://localhost:27017'),
    MONGODB_DB: z.string().min(1).default('spendings'),

    // Logging
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

    // Features
    ENABLE_SWAGGER: booleanFlag.default('true')
});

export type Environment = z.infer<typeof environmentSchema>;

export type EnvironmentSource = Record<string, string | undefined>;

/**
 * Parses the raw variables, listing every invalid one in the thrown error.
 */
export function loadEnvironment(source: EnvironmentSource = process.env): Environment {
    const result = environmentSchema.safeParse(source);

    if (!result.success) {
        const invalid = result.error.errors.map(issue => ({
            variable: issue.path.join('.'),
            message: issue.message
        }));
        throw new InfrastructureException(
            `Invalid configuration: ${invalid.map(item => item.variable).join(', ')}`,
            'CONFIGURATION_ERROR',
            500,
            invalid
        );
    }

    return result.data;
}

export class ConfigService {
    private readonly config: Environment;

    constructor(source: EnvironmentSource = process.env) {
        this.config = loadEnvironment(source);
    }

    get<K extends keyof Environment>(key: K): Environment[K] {
        return this.config[key];
    }

    isDevelopment(): boolean {
        return this.config.NODE_ENV === 'development';
    }

    isProduction(): boolean {
        return this.config.NODE_ENV === 'production';
    }

    getCorsOrigin(): string | string[] {
        const origin = this.config.CORS_ORIGIN.trim();
        if (origin === '*') {
            return '*';
        }
        return origin.split(',').map(item => item.trim()).filter(item => item.length > 0);
    }
}
