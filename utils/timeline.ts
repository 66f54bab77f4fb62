
import { Segment, SegmentInput, TimeWindow, Timeline, Transition } from '../types';
import { InvalidTimelineError } from './errors';
import { chooseMotion } from './kenBurns';

export const DEFAULT_TRANSITION_OVERLAP = 1.0;
export const DEFAULT_SEED = 5000;

export interface TimelineOptions {
    overlap?: number;
    seed?: number;
}

export function assertValidDurations(durations: readonly number[], overlap: number): void {
    if (durations.length < 2) {
        throw new InvalidTimelineError(`A timeline needs at least 2 segments for a crossfade, got ${durations.length}`);
    }
    if (!Number.isFinite(overlap) || overlap < 0) {
        throw new InvalidTimelineError(`Transition overlap must be a non-negative number, got ${overlap}`);
    }
    durations.forEach((duration, i) => {
        if (!Number.isFinite(duration) || duration <= 0) {
            throw new InvalidTimelineError(`Segment ${i} duration must be > 0, got ${duration}`);
        }
    });
    for (let i = 0; i < durations.length - 1; i++) {
        const shorter = Math.min(durations[i], durations[i + 1]);
        if (overlap > shorter) {
            throw new InvalidTimelineError(
                `Transition overlap ${overlap}s between segments ${i} and ${i + 1} exceeds the shorter duration ${shorter}s`
            );
        }
    }
}

class FrozenTimeline implements Timeline {
    readonly segments: readonly Segment[];
    readonly transitions: readonly Transition[];
    private readonly total: number;

    constructor(segments: Segment[], transitions: Transition[], readonly overlap: number, readonly seed: number) {
        this.segments = Object.freeze(segments.map(s => Object.freeze(s)));
        this.transitions = Object.freeze(transitions.map(t => Object.freeze(t)));
        // Sum of durations minus sum of overlaps, i.e. the end of the last segment
        this.total = Math.max(0, segments[segments.length - 1].end);
        Object.freeze(this);
    }

    durationAt(index: number): TimeWindow {
        const segment = this.segments[index];
        if (!Number.isInteger(index) || !segment) {
            throw new RangeError(`No segment at index ${index}`);
        }
        return { start: segment.start, end: segment.end };
    }

    totalDuration(): number {
        return this.total;
    }
}

export function buildTimeline(inputs: readonly SegmentInput[], options: TimelineOptions = {}): Timeline {
    const overlap = options.overlap ?? DEFAULT_TRANSITION_OVERLAP;
    const seed = options.seed ?? DEFAULT_SEED;
    assertValidDurations(inputs.map(s => s.duration), overlap);

    const segments: Segment[] = [];
    let cursor = 0;
    inputs.forEach((input, index) => {
        const start = index === 0 ? 0 : cursor - overlap;
        const end = start + input.duration;
        segments.push({
            index,
            text: input.text,
            image: input.image,
            start,
            end,
            duration: input.duration,
            motion: chooseMotion(seed, index),
        });
        cursor = end;
    });

    const transitions: Transition[] = segments.slice(1).map(next => {
        const prev = segments[next.index - 1];
        return { from: prev.index, to: next.index, start: next.start, end: prev.end, duration: overlap };
    });

    return new FrozenTimeline(segments, transitions, overlap, seed);
}

/**
 * Partition of [0, total) handing each instant to exactly one segment for
 * subtitles. Neighbours hand over at the middle of their crossfade.
 */
export function cueWindows(timeline: Timeline): TimeWindow[] {
    const { segments, transitions } = timeline;
    return segments.map((segment, i) => {
        const incoming = transitions[i - 1];
        const outgoing = transitions[i];
        return {
            start: incoming ? incoming.start + incoming.duration / 2 : 0,
            end: outgoing ? outgoing.start + outgoing.duration / 2 : timeline.totalDuration(),
        };
    });
}
