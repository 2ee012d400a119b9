import { EventViewError } from "../event_view_error.js";

/** Run fn and return the EventViewError it throws; anything else fails the test. */
export function catchViewError(fn: () => unknown): EventViewError {
    try {
        fn();
    } catch (e) {
        if (e instanceof EventViewError) return e;
        throw e;
    }
    throw new Error("Expected an EventViewError to be thrown");
}

export async function catchViewErrorAsync(fn: () => Promise<unknown>): Promise<EventViewError> {
    try {
        await fn();
    } catch (e) {
        if (e instanceof EventViewError) return e;
        throw e;
    }
    throw new Error("Expected an EventViewError to be thrown");
}
