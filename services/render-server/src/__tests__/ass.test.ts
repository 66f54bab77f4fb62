import { describe, it, expect } from 'vitest';
import { SubtitleTrack, WordCue } from '../../../../types';
import { buildAssScript, cueToAssText, escapeAss, escapeFilterPath, formatAssTime, toAssColor } from '../ass';

const SIZE = { width: 720, height: 1280 };
const FONT = { path: '/fonts/Inter.ttf', family: 'Inter' };

const wordCue: WordCue = {
    kind: 'word',
    start: 0.75,
    end: 1.5,
    segmentIndex: 0,
    wordIndex: 1,
    text: 'world',
    run: [
        { text: 'Hello', highlighted: false },
        { text: 'world', highlighted: true },
    ],
};

describe('toAssColor', () => {
    it('swaps hex colours into blue-green-red order', () => {
        expect(toAssColor('#FF8800')).toBe('0088FF');
        expect(toAssColor('#abc')).toBe('CCBBAA');
    });

    it('knows basic colour names', () => {
        expect(toAssColor('yellow')).toBe('00FFFF');
        expect(toAssColor(' White ')).toBe('FFFFFF');
    });

    it('rejects anything else', () => {
        expect(() => toAssColor('teal')).toThrow('Unsupported subtitle colour: teal');
        expect(() => toAssColor('#12345')).toThrow();
    });
});

describe('formatAssTime', () => {
    it('formats hours, minutes, seconds and centiseconds', () => {
        expect(formatAssTime(3723.456)).toBe('1:02:03.46');
        expect(formatAssTime(0.75)).toBe('0:00:00.75');
    });

    it('never goes below zero', () => {
        expect(formatAssTime(-1)).toBe('0:00:00.00');
    });
});

describe('cueToAssText', () => {
    it('colours only the highlighted word', () => {
        expect(cueToAssText(wordCue, '00FFFF')).toBe('Hello {\\c&H00FFFF&}world{\\r}');
    });

    it('escapes override braces and line breaks', () => {
        expect(escapeAss('a{b}\nc')).toBe('a\\{b\\}\\Nc');
    });

    it('keeps literal backslashes from starting an escape', () => {
        expect(escapeAss('C:\\new')).toBe('C:\\\u2060new');
        expect(escapeAss('\\N\\h')).toBe('\\\u2060N\\\u2060h');
        expect(escapeAss('\\{')).toBe('\\\u2060\\{');
    });
});

describe('buildAssScript', () => {
    const track: SubtitleTrack = {
        mode: 'word',
        cues: [
            { kind: 'block', start: 0, end: 0.75, segmentIndex: 0, text: 'Intro line' },
            wordCue,
            { kind: 'block', start: 1.5, end: 1.502, segmentIndex: 0, text: 'too short' },
            { kind: 'block', start: 1.502, end: 3, segmentIndex: 1, text: 'Second' },
        ],
    };

    it('sizes the script to the output and styles it from the defaults', () => {
        const lines = buildAssScript(track, { size: SIZE, font: FONT, fontSize: 40 }).split('\n');
        expect(lines).toContain('PlayResX: 720');
        expect(lines).toContain('PlayResY: 1280');
        expect(lines).toContain(
            'Style: Default,Inter,40,&H00FFFFFF,&H0000FFFF,&H00000000,&H80000000,0,0,0,0,100,100,0,0,1,2,0,2,36,36,256,1'
        );
    });

    it('writes one dialogue line per visible cue', () => {
        const dialogue = buildAssScript(track, { size: SIZE, font: FONT, fontSize: 40 })
            .split('\n')
            .filter(line => line.startsWith('Dialogue:'));
        expect(dialogue).toEqual([
            'Dialogue: 0,0:00:00.00,0:00:00.75,Default,,0,0,0,,Intro line',
            'Dialogue: 0,0:00:00.75,0:00:01.50,Default,,0,0,0,,Hello {\\c&H00FFFF&}world{\\r}',
            'Dialogue: 0,0:00:01.50,0:00:03.00,Default,,0,0,0,,Second',
        ]);
    });

    it('places top subtitles near the upper edge', () => {
        const script = buildAssScript(track, {
            size: SIZE,
            font: FONT,
            fontSize: 32,
            style: { position: 'top', color: '#FF0000', highlightColor: 'cyan', outlineColor: '#000' },
        });
        expect(script).toContain(
            'Style: Default,Inter,32,&H000000FF,&H00FFFF00,&H00000000,&H80000000,0,0,0,0,100,100,0,0,1,2,0,8,36,36,128,1'
        );
        expect(script).toContain('{\\c&HFFFF00&}world{\\r}');
    });
});

describe('escapeFilterPath', () => {
    it('escapes separators and quotes for ffmpeg filter arguments', () => {
        expect(escapeFilterPath("C:\\fonts\\it's")).toBe("C\\:/fonts/it\\'s");
    });
});
