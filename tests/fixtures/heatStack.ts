import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { schemasFromDefinition } from '../../libs/registry/definitions.js';
import { ProfileTypeSchema } from '../../libs/schema/profileTypeSchema.js';

/** Directory of the profile type definitions shipped with the catalog */
export const SCHEMA_DIR = fileURLToPath(new URL('../../schemas/', import.meta.url));

export function loadHeatStackDefinition(): unknown {
    return JSON.parse(fs.readFileSync(path.join(SCHEMA_DIR, 'os.heat.stack.json'), 'utf-8'));
}

export function heatStackSchema(): ProfileTypeSchema {
    const [schema] = schemasFromDefinition(loadHeatStackDefinition());
    return schema;
}

/** Normalized `os.heat.stack-1.0` spec when nothing is supplied */
export const HEAT_STACK_DEFAULTS = {
    context: {},
    disable_rollback: true,
    environment: {},
    files: {},
    parameters: {},
    template: {},
    template_url: ''
};
