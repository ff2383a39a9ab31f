/**
 * Schema Registry
 *
 * Catalog of profile type schemas keyed by (type name, version). A registry
 * is filled once during start-up and then sealed; a sealed registry never
 * changes, so any number of concurrent readers can share it without locks.
 * Hot reload builds a new registry and swaps it in through RegistryHolder.
 */

import {
    DuplicateSchemaError,
    InvalidSchemaError,
    RegistrySealedError,
    UnknownSchemaError
} from '../errors/profileErrors.js';
import { ProfileTypeSchema, schemaKey } from '../schema/profileTypeSchema.js';
import { compareSchemaVersions, isSchemaVersion } from '../schema/versions.js';
import { schemasFromDefinition } from './definitions.js';
import { checkProfileTypeSchema } from './schemaInvariants.js';

export class SchemaRegistry {
    private readonly schemas = new Map<string, Map<string, ProfileTypeSchema>>();
    private sealed = false;

    /**
     * @throws RegistrySealedError after seal()
     * @throws DuplicateSchemaError when the (type name, version) pair is taken
     * @throws InvalidSchemaError when a field or ledger invariant is violated
     */
    register(schema: ProfileTypeSchema): void {
        this.assertRegistrable(schema);
        this.store(schema);
    }

    /**
     * Registers every version a definition document lists. Either all of
     * them are registered or, on the first failure, none is.
     *
     * @returns the registered schemas in ascending version order
     */
    registerDefinition(document: unknown): ProfileTypeSchema[] {
        const schemas = schemasFromDefinition(document).sort(versionOrder);

        for (const schema of schemas) {
            this.assertRegistrable(schema);
        }
        for (const schema of schemas) {
            this.store(schema);
        }
        return schemas;
    }

    /**
     * @throws UnknownSchemaError
     */
    lookup(typeName: string, version: string): ProfileTypeSchema {
        const schema = this.schemas.get(typeName)?.get(version);
        if (!schema) {
            throw new UnknownSchemaError(typeName, version);
        }
        return schema;
    }

    /**
     * Highest registered version of a type, by numeric major.minor order.
     * @throws UnknownSchemaError
     */
    lookupLatest(typeName: string): ProfileTypeSchema {
        let latest: ProfileTypeSchema | undefined;
        for (const schema of this.list(typeName)) {
            latest = schema;
        }
        if (!latest) {
            throw new UnknownSchemaError(typeName);
        }
        return latest;
    }

    /**
     * Registered versions of a type in ascending order. The returned iterable
     * is lazy and can be iterated any number of times; an unknown type gives
     * an empty sequence.
     */
    list(typeName: string): Iterable<ProfileTypeSchema> {
        const schemas = this.schemas;
        return {
            *[Symbol.iterator]() {
                const versions = schemas.get(typeName);
                if (!versions) {
                    return;
                }
                yield* [...versions.values()].sort((a, b) => compareSchemaVersions(a.version, b.version));
            }
        };
    }

    typeNames(): string[] {
        return [...this.schemas.keys()].sort();
    }

    get size(): number {
        let total = 0;
        for (const versions of this.schemas.values()) {
            total += versions.size;
        }
        return total;
    }

    /**
     * Stops further registration. Idempotent.
     */
    seal(): this {
        this.sealed = true;
        return this;
    }

    get isSealed(): boolean {
        return this.sealed;
    }

    private assertRegistrable(schema: ProfileTypeSchema): void {
        if (this.sealed) {
            throw new RegistrySealedError(schema.typeName, schema.version);
        }
        if (this.schemas.get(schema.typeName)?.has(schema.version)) {
            throw new DuplicateSchemaError(schema.typeName, schema.version);
        }
        const problems = checkProfileTypeSchema(schema);
        if (problems.length > 0) {
            throw new InvalidSchemaError(problems, schemaKey(schema.typeName, schema.version));
        }
    }

    private store(schema: ProfileTypeSchema): void {
        const versions = this.schemas.get(schema.typeName) ?? new Map<string, ProfileTypeSchema>();
        versions.set(schema.version, schema);
        this.schemas.set(schema.typeName, versions);
    }
}

/**
 * Version order for schemas that have not passed the invariant checks yet;
 * malformed versions sort by their text and are rejected afterwards.
 */
function versionOrder(a: ProfileTypeSchema, b: ProfileTypeSchema): number {
    if (isSchemaVersion(a.version) && isSchemaVersion(b.version)) {
        return compareSchemaVersions(a.version, b.version);
    }
    return a.version.localeCompare(b.version);
}
