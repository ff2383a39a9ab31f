import pino, { type Logger } from "pino";

import { REDACT_KEYS, REDACT_CENSOR } from "./redactionConfig.js";

export const logger = pino({
  level: process.env.LOG_LEVEL ?? "info",
  base: {
    system: "profile-types"
  },
  redact: {
    paths: REDACT_KEYS,
    censor: REDACT_CENSOR
  }
});

/**
 * Returns a child logger tagged with the component name.
 */
export function getComponentLogger(component: string, parent: Logger = logger): Logger {
  return parent.child({ component });
}

/**
 * Returns a child logger with the profile type being processed attached.
 */
export function getProfileTypeLogger(typeName: string, version: string, parent: Logger = logger): Logger {
  return parent.child({ typeName, version });
}
