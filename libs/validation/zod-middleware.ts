import { z, ZodTypeAny } from 'zod';
import { logger } from '../logging/logger.js';
import { InvalidSchemaError } from '../errors/profileErrors.js';

/**
 * Parses loosely typed input (definition documents, configuration) with a zod
 * schema. Every issue is reported with its path; failure throws
 * InvalidSchemaError so callers see one error kind for malformed documents.
 */
export function validate<S extends ZodTypeAny>(schema: S, data: unknown, context: string): z.output<S> {
    const result = schema.safeParse(data);

    if (!result.success) {
        const problems = result.error.issues.map(e =>
            `${e.path.length > 0 ? e.path.join('.') : '(root)'}: ${e.message}`
        );

        logger.warn({
            context,
            errors: problems
        }, "Document validation failure");

        throw new InvalidSchemaError(problems, context);
    }

    return result.data;
}

/**
 * Factory for reusable validators bound to one schema.
 */
export const createValidator = <S extends ZodTypeAny>(schema: S) => {
    return (data: unknown, contextLabel: string) => validate(schema, data, contextLabel);
};
