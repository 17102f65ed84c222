/**
 * Shared error factory for tool responses.
 *
 * All functions return the structured MCP error response shape directly,
 * allowing tool handlers to do:
 *   return errors.noPipelineLoaded();
 */

import { PipelineError, PublishIOError, RegistrationError } from './pipeline-errors.js';

/**
 * The standard MCP error response shape for domain errors.
 * Tool handlers return this object. The LLM reads the text and can self-correct.
 */
export type DomainErrorResponse = {
    isError: true;
    content: Array<{ type: 'text'; text: string }>;
};

/**
 * Base helper to construct a DomainErrorResponse from a message string.
 */
export function domainError(message: string): DomainErrorResponse {
    return {
        isError: true,
        content: [{ type: 'text', text: message }],
    };
}

export function invalidArgument(message: string): DomainErrorResponse {
    return domainError(`Invalid argument: ${message}`);
}

// ----------------------------------------------------------------------------
// pipeline
// ----------------------------------------------------------------------------

export function noPipelineLoaded(): DomainErrorResponse {
    return domainError('No pipeline configuration loaded. Call pipeline init or pipeline open first.');
}

export function configAlreadyExists(path: string): DomainErrorResponse {
    return domainError(`Pipeline configuration already exists: ${path}. Use pipeline open to load it.`);
}

// ----------------------------------------------------------------------------
// publish
// ----------------------------------------------------------------------------

export function unknownRegistration(id: string): DomainErrorResponse {
    return domainError(`No pending registration '${id}'. Call publish pending to list the registrations waiting for a retry.`);
}

/**
 * Renders a pipeline error with its code. Registration failures name the id to
 * retry with; failed commits list what rollback could not remove.
 */
export function fromError(error: PipelineError, registrationId?: string): DomainErrorResponse {
    let text = `[${error.code}] ${error.message}`;
    if (error instanceof RegistrationError && registrationId !== undefined) {
        text += ` Retry with publish retry_registration and registration_id '${registrationId}'.`;
    }
    if (error instanceof PublishIOError && error.leftovers.length > 0) {
        text += ` Remove by hand: ${error.leftovers.join(', ')}`;
    }
    const published = error.context.published;
    const labels = Array.isArray(published) ? published.filter((label): label is string => typeof label === 'string') : [];
    if (labels.length > 0) {
        text += ` Already published: ${labels.join(', ')}.`;
    }
    return domainError(text);
}

/**
 * Turns a pipeline error into a response; anything else is rethrown for the
 * MCP server to report.
 */
export function toolError(error: unknown): DomainErrorResponse {
    if (error instanceof PipelineError) return fromError(error);
    throw error;
}
