/**
 * Event View Error Taxonomy
 *
 * Every failure surfaced by the view layer maps to one of these codes.
 * Selection outcomes (a pair left undefined) are not errors.
 */

export enum EventViewErrorCode {
    /** SummaryInfo absent, or missing the requested channel / uncertainty source */
    MISSING_METADATA = "MISSING_METADATA",

    /** Requested composite needs a jet pair that was not selected */
    MISSING_SIGNAL_OBJECT = "MISSING_SIGNAL_OBJECT",

    /** Leg or jet index outside the allowed range */
    INVALID_INDEX = "INVALID_INDEX",

    /** Incompatible options, or an unsupported period/tagger combination */
    INVALID_CONFIGURATION = "INVALID_CONFIGURATION",

    /** Flat record failed shape validation while loading */
    INVALID_RECORD = "INVALID_RECORD",
}

export interface EventViewErrorDetail {
    readonly code: EventViewErrorCode;
    readonly message: string;
    readonly event_id?: string;
    readonly metadata?: Record<string, unknown>;
}

export class EventViewError extends Error {
    readonly code: EventViewErrorCode;
    readonly event_id?: string;
    readonly metadata?: Record<string, unknown>;

    constructor(detail: EventViewErrorDetail) {
        super(detail.message);
        this.name = "EventViewError";
        this.code = detail.code;
        this.event_id = detail.event_id;
        this.metadata = detail.metadata;

        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, EventViewError);
        }
    }

    toJSON(): EventViewErrorDetail {
        return {
            code: this.code,
            message: this.message,
            event_id: this.event_id,
            metadata: this.metadata,
        };
    }
}

export function missingMetadata(message: string, metadata?: Record<string, unknown>): EventViewError {
    return new EventViewError({ code: EventViewErrorCode.MISSING_METADATA, message, metadata });
}

export function missingSignalObject(message: string, event_id?: string): EventViewError {
    return new EventViewError({ code: EventViewErrorCode.MISSING_SIGNAL_OBJECT, message, event_id });
}

export function invalidIndex(message: string, metadata?: Record<string, unknown>): EventViewError {
    return new EventViewError({ code: EventViewErrorCode.INVALID_INDEX, message, metadata });
}

export function invalidConfiguration(message: string, metadata?: Record<string, unknown>): EventViewError {
    return new EventViewError({ code: EventViewErrorCode.INVALID_CONFIGURATION, message, metadata });
}

// ============================================================================
// RESULT VALUES
// ============================================================================

export type ViewResult<T> =
    | { readonly ok: true; readonly value: T }
    | { readonly ok: false; readonly error: EventViewError };

/**
 * Run a throwing accessor and return its outcome as a value.
 * Only EventViewError is converted; anything else is a bug and is rethrown.
 */
export function attempt<T>(fn: () => T): ViewResult<T> {
    try {
        return { ok: true, value: fn() };
    } catch (error) {
        if (error instanceof EventViewError) {
            return { ok: false, error };
        }
        throw error;
    }
}
