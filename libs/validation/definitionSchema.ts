import { z } from 'zod';
import { FIELD_TYPES, FieldType, FieldValue } from '../schema/fieldTypes.js';
import { SUPPORT_STATUSES } from '../schema/supportStatus.js';

/**
 * zod schemas for the profile type definition document: the JSON shape
 * plugins and schema files hand to the registry.
 *
 * {
 *   type_name: "os.heat.stack",
 *   schema: { <field>: { type, default?, description, required?, updatable? } },
 *   support_status: { "1.0": [{ status: "SUPPORTED", since: "2016.04" }] }
 * }
 */

export const FieldValueSchema: z.ZodType<FieldValue> = z.lazy(() =>
    z.union([
        z.null(),
        z.boolean(),
        z.number().finite(),
        z.string(),
        z.array(FieldValueSchema),
        z.record(FieldValueSchema)
    ])
);

export const ConstraintDefinitionSchema = z.discriminatedUnion('type', [
    z.object({
        type: z.literal('AllowedValues'),
        values: z.array(FieldValueSchema)
    }).strict(),
    z.object({
        type: z.literal('Range'),
        min: z.number().finite().optional(),
        max: z.number().finite().optional()
    }).strict(),
    z.object({
        type: z.literal('Length'),
        min: z.number().int().nonnegative().optional(),
        max: z.number().int().nonnegative().optional()
    }).strict()
]);

export interface FieldDefinition {
    type: FieldType;
    default?: FieldValue;
    description?: string;
    required?: boolean;
    updatable?: boolean;
    /** Item schema for a List, key schemas for a Map */
    schema?: FieldDefinition | Record<string, FieldDefinition>;
    constraints?: z.infer<typeof ConstraintDefinitionSchema>[];
    min_version?: string;
    max_version?: string;
}

export const FieldDefinitionSchema: z.ZodType<FieldDefinition> = z.lazy(() =>
    z.object({
        type: z.enum(FIELD_TYPES),
        default: FieldValueSchema.optional(),
        description: z.string().optional(),
        required: z.boolean().optional(),
        updatable: z.boolean().optional(),
        schema: z.union([FieldDefinitionSchema, z.record(FieldDefinitionSchema)]).optional(),
        constraints: z.array(ConstraintDefinitionSchema).optional(),
        min_version: z.string().optional(),
        max_version: z.string().optional()
    }).strict()
);

export const SupportStatusEntrySchema = z.object({
    status: z.enum(SUPPORT_STATUSES),
    since: z.string().min(1)
}).strict();

export const ProfileTypeDefinitionSchema = z.object({
    type_name: z.string().min(1),
    description: z.string().optional(),
    schema: z.record(FieldDefinitionSchema),
    support_status: z.record(z.array(SupportStatusEntrySchema))
        .refine(versions => Object.keys(versions).length > 0, {
            message: 'at least one version must be listed'
        })
}).strict();

export type ProfileTypeDefinition = z.infer<typeof ProfileTypeDefinitionSchema>;

/**
 * Distinguishes a single field definition (List item schema) from a record
 * of key definitions (Map schema).
 */
export function isFieldDefinition(
    value: FieldDefinition | Record<string, FieldDefinition>
): value is FieldDefinition {
    return typeof value.type === 'string';
}
