import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { SubtitleTrack, WordTiming } from '../../types';
import { SubtitleCoverageError } from '../errors';
import {
    activeCue,
    assertTrackCoverage,
    buildBlockTrack,
    buildSubtitleTrack,
    buildWordTrack,
    cueText,
    parseTranscript,
} from '../subtitles';
import { buildTimeline } from '../timeline';
import { makeSegments } from './fixtures';

// Segments [0, 2.5] and [1.5, 4.5]; cue windows hand over at 2.0
const timeline = buildTimeline(makeSegments([2.5, 3]), { overlap: 1 });

const helloWorld: WordTiming[] = [
    { word: 'Hello', start: 0, end: 0.5 },
    { word: 'world', start: 0.6, end: 1.1 },
];

describe('buildSubtitleTrack in word mode', () => {
    const track = buildSubtitleTrack(timeline, helloWorld);

    it('highlights the word being spoken', () => {
        const cue = activeCue(track, 0.3);
        expect(cue.kind).toBe('word');
        if (cue.kind !== 'word') return;
        expect(cue.text).toBe('Hello');
        expect(cue.run).toEqual([{ text: 'Hello', highlighted: true }]);
    });

    it('keeps earlier words visible while highlighting the current one', () => {
        const cue = activeCue(track, 0.8);
        expect(cue.kind).toBe('word');
        if (cue.kind !== 'word') return;
        expect(cue.run).toEqual([
            { text: 'Hello', highlighted: false },
            { text: 'world', highlighted: true },
        ]);
        expect(cueText(cue)).toBe('Hello world');
    });

    it('shows the block text during a short pause between words', () => {
        expect(activeCue(track, 0.55)).toEqual({
            kind: 'block',
            start: 0.5,
            end: 0.6,
            segmentIndex: 0,
            text: 'Segment 1 narration.',
        });
    });

    it('ends each word cue at the word\'s own end time', () => {
        expect(activeCue(track, 0.3)).toMatchObject({ kind: 'word', start: 0, end: 0.5 });
        const paused = buildSubtitleTrack(timeline, [
            { word: 'Hello', start: 0, end: 0.5 },
            { word: 'world', start: 0.9, end: 1.4 },
        ]);
        expect(activeCue(paused, 0.7)).toMatchObject({ kind: 'block', start: 0.5, end: 0.9 });
        expect(activeCue(paused, 1)).toMatchObject({ kind: 'word', text: 'world', start: 0.9, end: 1.4 });
    });

    it('falls back to the segment text after the last word', () => {
        expect(activeCue(track, 1.5)).toEqual({
            kind: 'block',
            start: 1.1,
            end: 2,
            segmentIndex: 0,
            text: 'Segment 1 narration.',
        });
    });

    it('shows block text for a segment without words', () => {
        expect(activeCue(track, 3)).toEqual({
            kind: 'block',
            start: 2,
            end: 4.5,
            segmentIndex: 1,
            text: 'Segment 2 narration.',
        });
    });

    it('lays the cues out back to back', () => {
        expect(track.mode).toBe('word');
        expect(track.cues.map(c => [c.kind, c.start, c.end])).toEqual([
            ['word', 0, 0.5],
            ['block', 0.5, 0.6],
            ['word', 0.6, 1.1],
            ['block', 1.1, 2],
            ['block', 2, 4.5],
        ]);
    });

    it('has exactly one active cue at every sampled time', () => {
        for (let i = 0; i < 450; i++) {
            const t = i / 100;
            const matches = track.cues.filter(c => t >= c.start && t < c.end);
            expect(matches).toHaveLength(1);
            expect(activeCue(track, t)).toBe(matches[0]);
        }
    });

    it('is deterministic', () => {
        expect(buildSubtitleTrack(timeline, helloWorld)).toEqual(track);
    });
});

describe('buildWordTrack', () => {
    it('shows block text during a long pause', () => {
        const track = buildWordTrack(timeline, [
            { word: 'One', start: 0, end: 0.5 },
            { word: 'two', start: 1.8, end: 1.9 },
        ]);
        expect(track.cues.map(c => [c.kind, c.start, c.end])).toEqual([
            ['word', 0, 0.5],
            ['block', 0.5, 1.8],
            ['word', 1.8, 1.9],
            ['block', 1.9, 2],
            ['block', 2, 4.5],
        ]);
    });

    it('covers leading silence with the block text', () => {
        const track = buildWordTrack(timeline, [{ word: 'late', start: 1, end: 1.5 }]);
        expect(track.cues[0]).toMatchObject({ kind: 'block', start: 0, end: 1, segmentIndex: 0 });
    });

    it('assigns a word to the window holding its start and clips its end', () => {
        const track = buildWordTrack(timeline, [{ word: 'edge', start: 1.9, end: 2.3 }]);
        expect(track.cues.map(c => [c.kind, c.segmentIndex, c.start, c.end])).toEqual([
            ['block', 0, 0, 1.9],
            ['word', 0, 1.9, 2],
            ['block', 1, 2, 4.5],
        ]);
    });

    it('trims words, drops blank ones and orders them by start', () => {
        const track = buildWordTrack(timeline, [
            { word: 'world', start: 0.6, end: 1.1 },
            { word: '   ', start: 0.2, end: 0.3 },
            { word: '  Hello ', start: 0, end: 0.5 },
        ]);
        const words = track.cues.flatMap(c => (c.kind === 'word' ? [c.text] : []));
        expect(words).toEqual(['Hello', 'world']);
    });

    it('skips a word swallowed by the previous one', () => {
        const track = buildWordTrack(timeline, [
            { word: 'long', start: 0, end: 1 },
            { word: 'inside', start: 0.5, end: 0.8 },
        ]);
        expect(track.cues.map(c => [c.kind, c.start, c.end])).toEqual([
            ['word', 0, 1],
            ['block', 1, 2],
            ['block', 2, 4.5],
        ]);
    });

    it('numbers words within each segment', () => {
        const track = buildWordTrack(timeline, [
            ...helloWorld,
            { word: 'again', start: 2.2, end: 2.6 },
        ]);
        const wordCues = track.cues.flatMap(c => (c.kind === 'word' ? [[c.segmentIndex, c.wordIndex]] : []));
        expect(wordCues).toEqual([[0, 0], [0, 1], [1, 0]]);
    });
});

describe('buildSubtitleTrack in block mode', () => {
    it('uses block mode without words', () => {
        expect(buildSubtitleTrack(timeline).mode).toBe('block');
        expect(buildSubtitleTrack(timeline, null).mode).toBe('block');
        expect(buildSubtitleTrack(timeline, []).mode).toBe('block');
    });

    it('gives each segment one cue between crossfade midpoints', () => {
        const track = buildBlockTrack(buildTimeline(makeSegments([4, 3]), { overlap: 1 }));
        expect(track.cues).toEqual([
            { kind: 'block', start: 0, end: 3.5, segmentIndex: 0, text: 'Segment 1 narration.' },
            { kind: 'block', start: 3.5, end: 6, segmentIndex: 1, text: 'Segment 2 narration.' },
        ]);
    });
});

describe('activeCue', () => {
    const gapped: SubtitleTrack = {
        mode: 'block',
        cues: [
            { kind: 'block', start: 0, end: 1, segmentIndex: 0, text: 'first' },
            { kind: 'block', start: 2, end: 3, segmentIndex: 1, text: 'second' },
        ],
    };

    it('keeps the last cue at and after the end of the track', () => {
        const track = buildSubtitleTrack(timeline, helloWorld);
        expect(activeCue(track, 4.5).segmentIndex).toBe(1);
        expect(activeCue(track, 10).segmentIndex).toBe(1);
    });

    it('fails when no cue covers t', () => {
        expect(() => activeCue(gapped, 1.5)).toThrow(SubtitleCoverageError);
    });

    it('reports where coverage breaks', () => {
        try {
            assertTrackCoverage(gapped, 3);
            expect.unreachable();
        } catch (err) {
            expect(err).toBeInstanceOf(SubtitleCoverageError);
            if (err instanceof SubtitleCoverageError) expect(err.t).toBe(1);
        }
    });

    it('rejects a track that stops short of the timeline', () => {
        expect(() => assertTrackCoverage(gapped, 4)).toThrow(SubtitleCoverageError);
    });
});

describe('parseTranscript', () => {
    it('accepts a flat word list', () => {
        expect(parseTranscript([{ word: 'hi', start: 0, end: 0.4 }])).toEqual([{ word: 'hi', start: 0, end: 0.4 }]);
    });

    it('flattens speech-to-text segments', () => {
        const words = parseTranscript({
            text: 'Hello world. Bye.',
            segments: [
                { id: 0, words: [{ word: ' Hello', start: 0, end: 0.5, probability: 0.9 }, { word: ' world.', start: 0.6, end: 1.1 }] },
                { id: 1 },
                { id: 2, words: [{ word: ' Bye.', start: 2, end: 2.4 }] },
            ],
        });
        expect(words).toEqual([
            { word: ' Hello', start: 0, end: 0.5 },
            { word: ' world.', start: 0.6, end: 1.1 },
            { word: ' Bye.', start: 2, end: 2.4 },
        ]);
    });

    it('rejects anything else', () => {
        expect(() => parseTranscript({ words: 'nope' })).toThrow(ZodError);
        expect(() => parseTranscript([{ word: 'x', start: '0', end: 1 }])).toThrow(ZodError);
    });
});
