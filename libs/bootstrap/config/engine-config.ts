import { z } from 'zod';
import { isRelease } from '../../schema/versions.js';
import { validate } from '../../validation/zod-middleware.js';
import { Env, GuardRule } from '../config-guard.js';

/**
 * Profile catalog configuration guards.
 */
export const PROFILE_CONFIG_GUARDS: GuardRule[] = [
    { type: 'required', name: 'PROFILE_SCHEMA_DIR' },

    {
        type: 'assert',
        check: (env) => env.PROFILE_CURRENT_RELEASE === undefined || isRelease(env.PROFILE_CURRENT_RELEASE),
        message: 'PROFILE_CURRENT_RELEASE must be a dotted release identifier such as 2017.01'
    },

    {
        type: 'forbidIf',
        name: 'PROFILE_UNSUPPORTED_POLICY',
        when: (env) => env.PROFILE_UNSUPPORTED_POLICY === 'fatal' && env.PROFILE_CURRENT_RELEASE === undefined,
        message: 'A fatal unsupported policy needs PROFILE_CURRENT_RELEASE to take effect'
    }
];

const EngineEnvSchema = z.object({
    PROFILE_SCHEMA_DIR: z.string().min(1),
    PROFILE_CURRENT_RELEASE: z.string().refine(isRelease, 'expected a dotted release identifier').optional(),
    PROFILE_UNSUPPORTED_POLICY: z.enum(['warn', 'fatal']).default('warn'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info')
});

export interface EngineConfig {
    readonly schemaDir: string;
    readonly currentRelease?: string;
    readonly unsupportedPolicy: 'warn' | 'fatal';
    readonly logLevel: string;
}

/**
 * @throws InvalidSchemaError listing every malformed variable
 */
export function loadEngineConfig(env: Env = process.env): EngineConfig {
    const parsed = validate(EngineEnvSchema, env, 'engine configuration');

    return Object.freeze({
        schemaDir: parsed.PROFILE_SCHEMA_DIR,
        ...(parsed.PROFILE_CURRENT_RELEASE !== undefined && { currentRelease: parsed.PROFILE_CURRENT_RELEASE }),
        unsupportedPolicy: parsed.PROFILE_UNSUPPORTED_POLICY,
        logLevel: parsed.LOG_LEVEL
    });
}
