import crypto from 'crypto';
import { logger } from '../logging/logger.js';
import { EngineInternalError, ProfileTypeError } from './profileErrors.js';

/**
 * Wraps anything thrown outside the error taxonomy into an EngineInternalError
 * carrying an incident id, so callers always receive a ProfileTypeError and
 * the raw details stay in the logs.
 */
export const ErrorSanitizer = {
    sanitize: (err: unknown, contextLabel: string): ProfileTypeError => {
        if (err instanceof ProfileTypeError) return err;

        let originalErrorMessage: string;
        let originalErrorStack: string | undefined;

        if (err instanceof Error) {
            originalErrorMessage = err.message;
            originalErrorStack = err.stack;
        } else if (typeof err === 'string') {
            originalErrorMessage = err;
        } else {
            originalErrorMessage = String(err);
        }

        const incidentId = crypto.randomUUID();

        logger.error({
            incidentId,
            contextLabel,
            originalError: originalErrorMessage,
            stack: originalErrorStack
        }, 'Unexpected profile engine failure');

        return new EngineInternalError(
            `An internal error occurred in ${contextLabel}. Incident ID: ${incidentId}`,
            incidentId,
            contextLabel,
            { cause: err }
        );
    }
};
