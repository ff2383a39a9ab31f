import { bootstrap } from "../../../libs/bootstrap/startup.js";
import { logger } from "../../../libs/logging/logger.js";
import { ConfigGuard } from "../../../libs/bootstrap/config-guard.js";
import { PROFILE_CONFIG_GUARDS, loadEngineConfig } from "../../../libs/bootstrap/config/engine-config.js";

async function main() {
    ConfigGuard.enforce(PROFILE_CONFIG_GUARDS);
    const config = loadEngineConfig();
    logger.level = config.logLevel;

    const catalog = await bootstrap("profile-catalog", config);
    const registry = catalog.holder.current();

    for (const typeName of registry.typeNames()) {
        for (const schema of registry.list(typeName)) {
            const support = config.currentRelease === undefined
                ? null
                : catalog.engine.resolveSupport(typeName, schema.version, config.currentRelease);

            logger.info({
                typeName,
                version: schema.version,
                fields: [...schema.fields.keys()],
                support: support === null
                    ? 'not evaluated'
                    : support.success ? support.value : support.error.code
            }, "Profile type available");
        }
    }

    process.on("SIGHUP", () => {
        catalog.reload().catch(err => {
            logger.error({ err }, "Profile type reload failed; previous snapshot kept");
        });
    });

    logger.info("Profile catalog initialized");
}

main().catch(err => {
    logger.fatal(err);
    process.exit(1);
});
