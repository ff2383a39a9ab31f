/**
 * Schema loaders.
 *
 * The registry performs no discovery. Whatever finds profile type plugins
 * hands their definition documents over through a SchemaLoader, and
 * buildRegistry() registers them and seals the result.
 */

import fs from 'fs/promises';
import path from 'path';
import { InvalidSchemaError } from '../errors/profileErrors.js';
import { getComponentLogger } from '../logging/logger.js';
import { SchemaRegistry } from './schemaRegistry.js';

const logger = getComponentLogger('SchemaLoader');

export interface SchemaLoader {
    /** Label used in logs */
    readonly source: string;
    /** Definition documents, not yet validated */
    load(): Promise<unknown[]>;
}

/**
 * Serves definitions supplied in code, such as built-in profile types.
 */
export class StaticSchemaLoader implements SchemaLoader {
    readonly source: string;

    constructor(private readonly definitions: readonly unknown[], source = 'static') {
        this.source = source;
    }

    async load(): Promise<unknown[]> {
        return [...this.definitions];
    }
}

/**
 * Reads every `*.json` file of one directory, in file name order, as a
 * definition document.
 */
export class DirectorySchemaLoader implements SchemaLoader {
    readonly source: string;

    constructor(directory: string) {
        this.source = path.resolve(directory);
    }

    async load(): Promise<unknown[]> {
        const names = (await fs.readdir(this.source))
            .filter(name => name.endsWith('.json'))
            .sort();

        const documents: unknown[] = [];
        for (const name of names) {
            const filePath = path.join(this.source, name);
            const contents = await fs.readFile(filePath, 'utf-8');
            try {
                documents.push(JSON.parse(contents));
            } catch (err) {
                if (!(err instanceof SyntaxError)) {
                    throw err;
                }
                throw new InvalidSchemaError([`${name}: ${err.message}`], 'profile type definition file');
            }
            logger.debug({ file: filePath }, 'Loaded profile type definition');
        }
        return documents;
    }
}

/**
 * Registers every definition of every loader, in loader order, and seals
 * the registry. Any invalid or duplicate definition aborts the build.
 */
export async function buildRegistry(loaders: readonly SchemaLoader[]): Promise<SchemaRegistry> {
    const registry = new SchemaRegistry();

    for (const loader of loaders) {
        const documents = await loader.load();
        for (const document of documents) {
            const schemas = registry.registerDefinition(document);
            logger.info({
                source: loader.source,
                typeName: schemas[0]?.typeName,
                versions: schemas.map(schema => schema.version)
            }, 'Registered profile type');
        }
    }

    return registry.seal();
}
