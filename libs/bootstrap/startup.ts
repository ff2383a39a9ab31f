import { ProfileTypeEngine } from "../engine/profileTypeEngine.js";
import { logger } from "../logging/logger.js";
import { DirectorySchemaLoader, SchemaLoader, buildRegistry } from "../registry/loader.js";
import { RegistryHolder } from "../registry/registryHolder.js";
import { SchemaRegistry } from "../registry/schemaRegistry.js";
import { EngineConfig } from "./config/engine-config.js";

export interface ProfileCatalog {
    readonly engine: ProfileTypeEngine;
    readonly holder: RegistryHolder;
    /** Re-reads every loader and swaps in the new snapshot */
    reload(): Promise<SchemaRegistry>;
}

/**
 * Loads every profile type definition, seals the registry and wires the
 * engine to it. Fails if any definition is invalid or duplicated.
 */
export async function bootstrap(
    serviceName: string,
    config: EngineConfig,
    extraLoaders: readonly SchemaLoader[] = []
): Promise<ProfileCatalog> {
    logger.info({ serviceName, schemaDir: config.schemaDir }, "Bootstrapping profile catalog");

    const loaders: SchemaLoader[] = [new DirectorySchemaLoader(config.schemaDir), ...extraLoaders];
    const holder = new RegistryHolder(await buildRegistry(loaders));

    const engine = new ProfileTypeEngine(holder, {
        ...(config.currentRelease !== undefined && { currentRelease: config.currentRelease }),
        unsupportedPolicy: config.unsupportedPolicy,
        logger: logger.child({ serviceName })
    });

    logger.info({
        serviceName,
        schemas: holder.current().size,
        typeNames: holder.current().typeNames()
    }, "Startup checks passed");

    return {
        engine,
        holder,
        reload: () => holder.replace(() => buildRegistry(loaders))
    };
}
