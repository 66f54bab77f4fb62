
import { z } from 'zod';
import { BlockCue, SubtitleCue, SubtitleTrack, TimeWindow, Timeline, WordCue, WordTiming } from '../types';
import { SubtitleCoverageError } from './errors';
import { cueWindows } from './timeline';

const wordTimingSchema = z.object({
    word: z.string(),
    start: z.number().finite(),
    end: z.number().finite(),
});

const transcriptSchema = z.union([
    z.array(wordTimingSchema),
    z.object({
        segments: z.array(
            z.object({
                words: z.array(wordTimingSchema).optional(),
            }).passthrough()
        ),
    }).passthrough(),
]);

/**
 * Flattens a speech-to-text result into one ordered word list. Accepts either a
 * plain `[{ word, start, end }]` array or Whisper's `--word_timestamps` JSON.
 */
export function parseTranscript(json: unknown): WordTiming[] {
    const parsed = transcriptSchema.parse(json);
    const words = Array.isArray(parsed) ? parsed : parsed.segments.flatMap(s => s.words ?? []);
    return words.map(w => ({ word: w.word, start: w.start, end: w.end }));
}

function blockCue(timeline: Timeline, segmentIndex: number, window: TimeWindow): BlockCue {
    return {
        kind: 'block',
        start: window.start,
        end: window.end,
        segmentIndex,
        text: timeline.segments[segmentIndex].text.trim(),
    };
}

export function buildBlockTrack(timeline: Timeline): SubtitleTrack {
    const cues = cueWindows(timeline)
        .map((window, i) => blockCue(timeline, i, window))
        .filter(cue => cue.end > cue.start);
    return { mode: 'block', cues };
}

function normalizeWords(words: readonly WordTiming[]): WordTiming[] {
    return words
        .map(w => ({ word: w.word.trim(), start: w.start, end: w.end }))
        .filter(w => w.word.length > 0 && Number.isFinite(w.start) && Number.isFinite(w.end) && w.end > w.start)
        .map((w, order) => ({ w, order }))
        .sort((a, b) => a.w.start - b.w.start || a.order - b.order)
        .map(({ w }) => w);
}

// Words whose start falls inside the window, clipped to it
function wordsInWindow(words: readonly WordTiming[], window: TimeWindow): WordTiming[] {
    return words
        .filter(w => w.start >= window.start && w.start < window.end)
        .map(w => ({ word: w.word, start: w.start, end: Math.min(w.end, window.end) }));
}

function segmentCues(
    timeline: Timeline,
    segmentIndex: number,
    window: TimeWindow,
    words: readonly WordTiming[]
): SubtitleCue[] {
    const fallback = (start: number, end: number): BlockCue => blockCue(timeline, segmentIndex, { start, end });
    if (words.length === 0) return [fallback(window.start, window.end)];

    const cues: SubtitleCue[] = [];
    const spoken: string[] = [];
    let cursor = window.start;

    for (const word of words) {
        const start = Math.max(word.start, cursor);
        if (word.end <= start) continue;

        // Pause between words: block text
        if (start > cursor) cues.push(fallback(cursor, start));

        const wordIndex = spoken.length;
        spoken.push(word.word);
        // Reveal policy: earlier words stay visible, the current one is highlighted, later ones are hidden
        const cue: WordCue = {
            kind: 'word',
            start,
            end: word.end,
            segmentIndex,
            wordIndex,
            text: word.word,
            run: spoken.map((text, i) => ({ text, highlighted: i === wordIndex })),
        };
        cues.push(cue);
        cursor = word.end;
    }

    if (cursor < window.end) cues.push(fallback(cursor, window.end));
    return cues;
}

/**
 * Karaoke track from a flat word list. Each word goes to the segment whose
 * subtitle window holds its start; any stretch of a segment without a word
 * shows that segment's block text instead.
 */
export function buildWordTrack(timeline: Timeline, words: readonly WordTiming[]): SubtitleTrack {
    const ordered = normalizeWords(words);
    const cues = cueWindows(timeline).flatMap((window, segmentIndex) =>
        window.end > window.start
            ? segmentCues(timeline, segmentIndex, window, wordsInWindow(ordered, window))
            : []
    );
    return { mode: 'word', cues };
}

export function buildSubtitleTrack(timeline: Timeline, words?: readonly WordTiming[] | null): SubtitleTrack {
    const track = words && words.length > 0 ? buildWordTrack(timeline, words) : buildBlockTrack(timeline);
    assertTrackCoverage(track, timeline.totalDuration());
    return track;
}

export function assertTrackCoverage(track: SubtitleTrack, totalDuration: number): void {
    const { cues } = track;
    if (totalDuration <= 0) return;
    if (cues.length === 0) {
        throw new SubtitleCoverageError('Subtitle track is empty', 0);
    }
    if (cues[0].start !== 0) {
        throw new SubtitleCoverageError(`Subtitle track starts at ${cues[0].start}s instead of 0`, 0);
    }
    for (let i = 1; i < cues.length; i++) {
        if (cues[i].start !== cues[i - 1].end) {
            throw new SubtitleCoverageError(
                `Cue ${i} starts at ${cues[i].start}s but the previous cue ends at ${cues[i - 1].end}s`,
                cues[i - 1].end
            );
        }
    }
    const last = cues[cues.length - 1];
    if (last.end !== totalDuration) {
        throw new SubtitleCoverageError(`Subtitle track ends at ${last.end}s instead of ${totalDuration}s`, last.end);
    }
}

// Exactly one cue for any t in [0, total); t at or past the end keeps the last cue up
export function activeCue(track: SubtitleTrack, t: number): SubtitleCue {
    const { cues } = track;
    let lo = 0;
    let hi = cues.length - 1;
    while (lo <= hi) {
        const mid = (lo + hi) >> 1;
        const cue = cues[mid];
        if (t < cue.start) hi = mid - 1;
        else if (t >= cue.end) lo = mid + 1;
        else return cue;
    }
    const last = cues[cues.length - 1];
    if (last && t >= last.end) return last;
    throw new SubtitleCoverageError(`No subtitle cue is active at ${t}s`, t);
}

export function cueText(cue: SubtitleCue): string {
    return cue.kind === 'word' ? cue.run.map(w => w.text).join(' ') : cue.text;
}
