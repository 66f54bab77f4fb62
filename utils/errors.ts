
// Malformed segment, duration, transition or motion input. Caller bug, never retried.
export class InvalidTimelineError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'InvalidTimelineError';
    }
}

// A timestamp without exactly one active cue. Reaching this is a defect in track building.
export class SubtitleCoverageError extends Error {
    constructor(message: string, readonly t?: number) {
        super(message);
        this.name = 'SubtitleCoverageError';
    }
}

export type RenderErrorCode = 'input' | 'encoder' | 'output' | 'cancelled';

export class RenderError extends Error {
    readonly code: RenderErrorCode;

    constructor(code: RenderErrorCode, message: string, cause?: unknown) {
        super(message, cause === undefined ? undefined : { cause });
        this.name = 'RenderError';
        this.code = code;
    }
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
