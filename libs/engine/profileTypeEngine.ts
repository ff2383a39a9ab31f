/**
 * Profile Type Engine
 *
 * Public entry point for callers (RPC handlers, the orchestration layer).
 * Each operation resolves the schema from the registry snapshot in effect,
 * runs the pure core function and returns a structured result. Errors from
 * the taxonomy come back as `{ success: false, error }`; anything else is
 * sanitized into an EngineInternalError first. Nothing is thrown.
 *
 * When a current release is configured, validate() and authorizeUpdate()
 * first resolve the support status of the schema at that release. DEPRECATED
 * and UNSUPPORTED produce warnings; with `unsupportedPolicy: 'fatal'` an
 * UNSUPPORTED status fails the call instead.
 */

import type { Logger } from 'pino';
import { ProfileTypeError, UnsupportedVersionError } from '../errors/profileErrors.js';
import { ErrorSanitizer } from '../errors/sanitizer.js';
import { getComponentLogger, getProfileTypeLogger } from '../logging/logger.js';
import { authorizeUpdate } from '../policy/updatePolicy.js';
import { RegistryHolder } from '../registry/registryHolder.js';
import { SchemaRegistry } from '../registry/schemaRegistry.js';
import { ProfileSpec } from '../schema/profileSpec.js';
import { ProfileTypeSchema } from '../schema/profileTypeSchema.js';
import { ResolvedSupportStatus, resolveSupportStatus } from '../support/supportStatusResolver.js';
import { validatePatch, validateSpec } from '../validation/normalizer.js';

export type UnsupportedPolicy = 'warn' | 'fatal';

export interface ProfileTypeEngineOptions {
    /** Release the platform runs; enables the support status gate */
    readonly currentRelease?: string;
    readonly unsupportedPolicy?: UnsupportedPolicy;
    readonly logger?: Logger;
}

export type EngineResult<T> =
    | { success: true; value: T; warnings: readonly string[] }
    | { success: false; error: ProfileTypeError };

/**
 * A fixed registry, or a holder whose snapshot may be replaced at runtime.
 */
export type RegistrySource = SchemaRegistry | RegistryHolder;

interface Outcome<T> {
    readonly value: T;
    readonly warnings: readonly string[];
}

export class ProfileTypeEngine {
    private readonly logger: Logger;
    private readonly currentRelease: string | undefined;
    private readonly unsupportedPolicy: UnsupportedPolicy;

    constructor(private readonly source: RegistrySource, options: ProfileTypeEngineOptions = {}) {
        this.logger = options.logger ?? getComponentLogger('ProfileTypeEngine');
        this.currentRelease = options.currentRelease;
        this.unsupportedPolicy = options.unsupportedPolicy ?? 'warn';
    }

    /**
     * Snapshot used by one operation from start to finish.
     */
    registry(): SchemaRegistry {
        return this.source instanceof RegistryHolder ? this.source.current() : this.source;
    }

    register(schema: ProfileTypeSchema): EngineResult<ProfileTypeSchema> {
        return this.run('register', () => {
            this.registry().register(schema);
            this.logger.info({ typeName: schema.typeName, version: schema.version }, 'Profile type registered');
            return { value: schema, warnings: [] };
        });
    }

    registerDefinition(document: unknown): EngineResult<readonly ProfileTypeSchema[]> {
        return this.run('registerDefinition', () => {
            const schemas = this.registry().registerDefinition(document);
            this.logger.info({
                typeName: schemas[0]?.typeName,
                versions: schemas.map(schema => schema.version)
            }, 'Profile type definition registered');
            return { value: schemas, warnings: [] };
        });
    }

    /**
     * Validates and normalizes a raw specification against one version.
     */
    validate(typeName: string, version: string, rawSpec: unknown): EngineResult<ProfileSpec> {
        return this.run('validate', () => {
            const schema = this.registry().lookup(typeName, version);
            return this.validateAgainst(schema, rawSpec);
        });
    }

    /**
     * Validates a raw specification against the latest registered version.
     */
    validateLatest(typeName: string, rawSpec: unknown): EngineResult<ProfileSpec> {
        return this.run('validateLatest', () => {
            const schema = this.registry().lookupLatest(typeName);
            return this.validateAgainst(schema, rawSpec);
        });
    }

    /**
     * Checks a partial update of a validated spec and returns the merged spec.
     * The patch is type-checked first; then every changed field must be
     * updatable.
     */
    authorizeUpdate(typeName: string, version: string, current: ProfileSpec, proposed: unknown): EngineResult<ProfileSpec> {
        return this.run('authorizeUpdate', () => {
            const schema = this.registry().lookup(typeName, version);
            const warnings = this.checkUsable(schema);
            const patch = validatePatch(schema, proposed);
            const merged = authorizeUpdate(schema, current, patch);

            getProfileTypeLogger(typeName, version, this.logger).debug({
                fields: Object.keys(patch)
            }, 'Profile update authorized');

            return { value: merged, warnings };
        });
    }

    resolveSupport(typeName: string, version: string, referenceRelease: string): EngineResult<ResolvedSupportStatus> {
        return this.run('resolveSupport', () => {
            const schema = this.registry().lookup(typeName, version);
            return { value: resolveSupportStatus(schema, referenceRelease), warnings: [] };
        });
    }

    private validateAgainst(schema: ProfileTypeSchema, rawSpec: unknown): Outcome<ProfileSpec> {
        const usageWarnings = this.checkUsable(schema);
        const { spec, warnings } = validateSpec(schema, rawSpec);
        return { value: spec, warnings: [...usageWarnings, ...warnings] };
    }

    /**
     * Support status gate at the configured current release.
     * @returns warnings for DEPRECATED or tolerated UNSUPPORTED versions
     */
    private checkUsable(schema: ProfileTypeSchema): string[] {
        if (this.currentRelease === undefined) {
            return [];
        }

        const resolved = resolveSupportStatus(schema, this.currentRelease);
        if (resolved.status === 'SUPPORTED') {
            return [];
        }

        const message = `Profile type ${schema.typeName}-${schema.version} is ${resolved.status} since ${resolved.since}`;

        if (resolved.status === 'UNSUPPORTED' && this.unsupportedPolicy === 'fatal') {
            throw new UnsupportedVersionError(
                schema.typeName,
                schema.version,
                this.currentRelease,
                `UNSUPPORTED since ${resolved.since}`
            );
        }

        getProfileTypeLogger(schema.typeName, schema.version, this.logger).warn({
            status: resolved.status,
            since: resolved.since,
            currentRelease: this.currentRelease
        }, 'Profile type version is not fully supported');

        return [message];
    }

    private run<T>(operation: string, fn: () => Outcome<T>): EngineResult<T> {
        try {
            const { value, warnings } = fn();
            return { success: true, value, warnings };
        } catch (err) {
            const error = ErrorSanitizer.sanitize(err, `ProfileTypeEngine.${operation}`);
            this.logger.warn({ operation, error: error.toJSON() }, 'Profile type operation failed');
            return { success: false, error };
        }
    }
}
