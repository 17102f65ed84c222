/**
 * Error classes for the publish pipeline.
 *
 * Every error carries a `_tag` for narrowing, a stable `code`, and a
 * structured `context` (identity, offending path or field) so callers can
 * render an actionable message. Tool handlers turn these into MCP error
 * responses through `errors.ts`.
 */

import { type ZodError, type ZodIssue } from 'zod';
import { type RegistrationPlan } from './types/publish.js';

export const ERROR_CODES = {
    CONFIG: 'TEXPUB_CONFIG_ERROR',
    DUPLICATE_KEY: 'TEXPUB_DUPLICATE_KEY',
    UNKNOWN_KEY: 'TEXPUB_UNKNOWN_KEY',
    UNKNOWN_TEMPLATE: 'TEXPUB_UNKNOWN_TEMPLATE',
    CYCLIC_TEMPLATE: 'TEXPUB_CYCLIC_TEMPLATE',
    MISSING_FIELD: 'TEXPUB_MISSING_FIELD',
    INVALID_FIELD_VALUE: 'TEXPUB_INVALID_FIELD_VALUE',
    NO_MATCH: 'TEXPUB_NO_MATCH',
    PATTERN_MISMATCH: 'TEXPUB_PATTERN_MISMATCH',
    INCONSISTENT_TEXTURE_SET: 'TEXPUB_INCONSISTENT_TEXTURE_SET',
    VALIDATION: 'TEXPUB_VALIDATION_ERROR',
    EXPORT: 'TEXPUB_EXPORT_ERROR',
    PUBLISH_IO: 'TEXPUB_PUBLISH_IO_ERROR',
    PUBLISH_CANCELLED: 'TEXPUB_PUBLISH_CANCELLED',
    REGISTRATION: 'TEXPUB_REGISTRATION_ERROR',
    VERSION_QUERY: 'TEXPUB_VERSION_QUERY_ERROR',
    TIMEOUT: 'TEXPUB_TIMEOUT',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

/**
 * Base class for all pipeline errors.
 */
export abstract class PipelineError extends Error {
    abstract readonly _tag: string;
    abstract readonly code: ErrorCode;
    readonly timestamp: Date;
    readonly context: Record<string, unknown>;

    constructor(message: string, context: Record<string, unknown> = {}) {
        super(message);
        this.name = this.constructor.name;
        this.timestamp = new Date();
        this.context = context;
    }

    /**
     * Get error details for logging
     */
    getDetails(): Record<string, unknown> {
        return {
            name: this.name,
            message: this.message,
            code: this.code,
            tag: this._tag,
            timestamp: this.timestamp,
            context: this.context,
        };
    }
}

// ----------------------------------------------------------------------------
// configuration
// ----------------------------------------------------------------------------

export class ConfigError extends PipelineError {
    readonly _tag = 'ConfigError' as const;
    readonly code = ERROR_CODES.CONFIG;
    readonly configPath: string;
    readonly zodError?: ZodError;

    constructor(message: string, configPath: string, zodError?: ZodError) {
        super(message, { configPath });
        this.configPath = configPath;
        this.zodError = zodError;
    }

    getValidationIssues(): ZodIssue[] {
        return this.zodError?.issues ?? [];
    }

    getFormattedErrors(): string[] {
        return this.getValidationIssues().map(issue => `${issue.path.join('.')}: ${issue.message}`);
    }
}

// ----------------------------------------------------------------------------
// keys & templates
// ----------------------------------------------------------------------------

export class DuplicateKeyError extends PipelineError {
    readonly _tag = 'DuplicateKeyError' as const;
    readonly code = ERROR_CODES.DUPLICATE_KEY;
    readonly keyName: string;

    constructor(keyName: string) {
        super(`Key '${keyName}' is already registered with a different definition.`, { keyName });
        this.keyName = keyName;
    }
}

export class UnknownKeyError extends PipelineError {
    readonly _tag = 'UnknownKeyError' as const;
    readonly code = ERROR_CODES.UNKNOWN_KEY;
    readonly keyName: string;

    constructor(keyName: string, templateName?: string) {
        const where = templateName !== undefined ? ` in template '${templateName}'` : '';
        super(`Unknown key '${keyName}'${where}.`, { keyName, templateName });
        this.keyName = keyName;
    }
}

export class UnknownTemplateError extends PipelineError {
    readonly _tag = 'UnknownTemplateError' as const;
    readonly code = ERROR_CODES.UNKNOWN_TEMPLATE;
    readonly templateName: string;

    constructor(templateName: string, referencedBy?: string) {
        const where = referencedBy !== undefined ? ` (referenced by '${referencedBy}')` : '';
        super(`Unknown template '${templateName}'${where}.`, { templateName, referencedBy });
        this.templateName = templateName;
    }
}

export class CyclicTemplateError extends PipelineError {
    readonly _tag = 'CyclicTemplateError' as const;
    readonly code = ERROR_CODES.CYCLIC_TEMPLATE;
    readonly cycle: string[];

    constructor(cycle: string[]) {
        super(`Template includes form a cycle: ${cycle.join(' -> ')}.`, { cycle });
        this.cycle = cycle;
    }
}

export class MissingFieldError extends PipelineError {
    readonly _tag = 'MissingFieldError' as const;
    readonly code = ERROR_CODES.MISSING_FIELD;
    readonly field: string;

    constructor(templateName: string, field: string) {
        super(`Template '${templateName}' requires a value for field '${field}'.`, { templateName, field });
        this.field = field;
    }
}

export class InvalidFieldValueError extends PipelineError {
    readonly _tag = 'InvalidFieldValueError' as const;
    readonly code = ERROR_CODES.INVALID_FIELD_VALUE;
    readonly field: string;

    constructor(field: string, value: unknown, reason: string) {
        super(`Invalid value ${JSON.stringify(value)} for field '${field}': ${reason}.`, { field, value, reason });
        this.field = field;
    }
}

export class NoMatchError extends PipelineError {
    readonly _tag = 'NoMatchError' as const;
    readonly code = ERROR_CODES.NO_MATCH;
    readonly path: string;

    constructor(templateName: string, path: string) {
        super(`Path '${path}' does not match template '${templateName}'.`, { templateName, path });
        this.path = path;
    }
}

// ----------------------------------------------------------------------------
// exported files
// ----------------------------------------------------------------------------

export class PatternMismatchError extends PipelineError {
    readonly _tag = 'PatternMismatchError' as const;
    readonly code = ERROR_CODES.PATTERN_MISMATCH;
    readonly filenames: string[];
    readonly reason: string;

    constructor(filenames: string[], reason: string) {
        super(
            `${filenames.length === 1 ? `File '${filenames[0]}' does` : `Files ${filenames.map(f => `'${f}'`).join(', ')} do`} ` +
            `not match '<textureSet>_<mapName>_<colorSpace>[.<udim>].<ext>': ${reason}.`,
            { filenames, reason },
        );
        this.filenames = filenames;
        this.reason = reason;
    }
}

export class InconsistentTextureSetError extends PipelineError {
    readonly _tag = 'InconsistentTextureSetError' as const;
    readonly code = ERROR_CODES.INCONSISTENT_TEXTURE_SET;
    readonly textureSet: string;

    constructor(textureSet: string, reason: string, paths: string[] = []) {
        super(`Texture set '${textureSet}' is inconsistent: ${reason}.`, { textureSet, reason, paths });
        this.textureSet = textureSet;
    }
}

// ----------------------------------------------------------------------------
// publish
// ----------------------------------------------------------------------------

export class ValidationError extends PipelineError {
    readonly _tag = 'ValidationError' as const;
    readonly code = ERROR_CODES.VALIDATION;

    constructor(message: string, context: Record<string, unknown> = {}) {
        super(message, context);
    }
}

export class ExportError extends PipelineError {
    readonly _tag = 'ExportError' as const;
    readonly code = ERROR_CODES.EXPORT;

    constructor(presetName: string, detail: string) {
        super(`Export with preset '${presetName}' failed: ${detail}`, { presetName, detail });
    }
}

export class PublishIOError extends PipelineError {
    readonly _tag = 'PublishIOError' as const;
    readonly code = ERROR_CODES.PUBLISH_IO;
    /** Destinations removed during rollback. */
    readonly rolledBack: string[];
    /** Paths rollback could not remove. Non-empty means the publish area needs attention. */
    readonly leftovers: string[];

    constructor(message: string, details: { identity?: unknown; failedPath?: string; rolledBack: string[]; leftovers: string[]; cause?: unknown }) {
        super(message, details);
        this.rolledBack = details.rolledBack;
        this.leftovers = details.leftovers;
    }
}

export class PublishCancelledError extends PipelineError {
    readonly _tag = 'PublishCancelledError' as const;
    readonly code = ERROR_CODES.PUBLISH_CANCELLED;
    readonly rolledBack: string[];

    constructor(state: string, rolledBack: string[] = []) {
        super(`Publish cancelled during ${state}.`, { state, rolledBack });
        this.rolledBack = rolledBack;
    }
}

export class RegistrationError extends PipelineError {
    readonly _tag = 'RegistrationError' as const;
    readonly code = ERROR_CODES.REGISTRATION;
    /** Published files that stay on disk; retry registration without copying them again. */
    readonly copiedPaths: string[];
    /** Pass to `PublishOrchestrator.register()` to retry. */
    readonly plan?: RegistrationPlan;

    constructor(message: string, copiedPaths: string[], plan?: RegistrationPlan) {
        super(message, { copiedPaths, identity: plan?.identity, version: plan?.version });
        this.copiedPaths = copiedPaths;
        this.plan = plan;
    }
}

export class VersionQueryError extends PipelineError {
    readonly _tag = 'VersionQueryError' as const;
    readonly code = ERROR_CODES.VERSION_QUERY;

    constructor(identity: unknown, detail: string) {
        super(`Could not determine the next version: ${detail}`, { identity, detail });
    }
}

export class TimeoutError extends PipelineError {
    readonly _tag = 'TimeoutError' as const;
    readonly code = ERROR_CODES.TIMEOUT;

    constructor(operation: string, timeoutMs: number) {
        super(`${operation} timed out after ${String(timeoutMs)}ms.`, { operation, timeoutMs });
    }
}

export type TexpubError =
    | ConfigError
    | DuplicateKeyError
    | UnknownKeyError
    | UnknownTemplateError
    | CyclicTemplateError
    | MissingFieldError
    | InvalidFieldValueError
    | NoMatchError
    | PatternMismatchError
    | InconsistentTextureSetError
    | ValidationError
    | ExportError
    | PublishIOError
    | PublishCancelledError
    | RegistrationError
    | VersionQueryError
    | TimeoutError;

/**
 * Returns the message of any thrown value.
 */
export function errorMessage(e: unknown): string {
    return e instanceof Error ? e.message : String(e);
}

/**
 * Narrows a caught value to a Node.js system error carrying a `code` such as ENOENT.
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
    return error instanceof Error && !(error instanceof PipelineError) && 'code' in error;
}
