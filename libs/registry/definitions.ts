import { InvalidSchemaError } from '../errors/profileErrors.js';
import { FieldSpecInput } from '../schema/fieldSpec.js';
import { ProfileTypeSchema, defineProfileType } from '../schema/profileTypeSchema.js';
import {
    FieldDefinition,
    ProfileTypeDefinition,
    ProfileTypeDefinitionSchema,
    isFieldDefinition
} from '../validation/definitionSchema.js';
import { createValidator } from '../validation/zod-middleware.js';

const parseDefinition = createValidator(ProfileTypeDefinitionSchema);

function toFieldInput(definition: FieldDefinition, location: string, problems: string[]): FieldSpecInput {
    const input: FieldSpecInput = {
        type: definition.type,
        ...(definition.default !== undefined && { default: definition.default }),
        ...(definition.required !== undefined && { required: definition.required }),
        ...(definition.updatable !== undefined && { updatable: definition.updatable }),
        ...(definition.description !== undefined && { description: definition.description }),
        ...(definition.constraints && { constraints: definition.constraints }),
        ...(definition.min_version !== undefined && { minVersion: definition.min_version }),
        ...(definition.max_version !== undefined && { maxVersion: definition.max_version })
    };

    const nested = definition.schema;
    if (nested === undefined) {
        return input;
    }

    switch (definition.type) {
        case 'List':
            if (!isFieldDefinition(nested)) {
                problems.push(`${location}.schema: a List schema is a single field definition`);
                break;
            }
            input.itemSchema = toFieldInput(nested, `${location}.schema`, problems);
            break;

        case 'Map':
            if (isFieldDefinition(nested)) {
                problems.push(`${location}.schema: a Map schema maps keys to field definitions`);
                break;
            }
            input.entrySchema = toFieldInputs(nested, `${location}.schema`, problems);
            break;

        default:
            problems.push(`${location}.schema: schema valid only for List or Map, not ${definition.type}`);
    }

    return input;
}

function toFieldInputs(
    definitions: Record<string, FieldDefinition>,
    location: string,
    problems: string[]
): Record<string, FieldSpecInput> {
    const inputs: Record<string, FieldSpecInput> = {};
    for (const [name, definition] of Object.entries(definitions)) {
        inputs[name] = toFieldInput(definition, `${location}.${name}`, problems);
    }
    return inputs;
}

/**
 * Parses a definition document and builds one ProfileTypeSchema per version
 * listed under `support_status`. Every version shares the field declarations;
 * `min_version` / `max_version` decide which fields exist in which version.
 *
 * The schemas are not checked against the registration invariants here.
 *
 * @throws InvalidSchemaError when the document does not have the definition shape
 */
export function schemasFromDefinition(document: unknown): ProfileTypeSchema[] {
    const definition: ProfileTypeDefinition = parseDefinition(document, 'profile type definition');

    const problems: string[] = [];
    const fields = toFieldInputs(definition.schema, 'schema', problems);
    if (problems.length > 0) {
        throw new InvalidSchemaError(problems, definition.type_name);
    }

    return Object.entries(definition.support_status).map(([version, entries]) =>
        defineProfileType({
            typeName: definition.type_name,
            version,
            ...(definition.description !== undefined && { description: definition.description }),
            fields,
            supportStatus: entries
        })
    );
}
