import fs from 'fs';
import { FontResource, Size, SubtitleCue, SubtitleStyle, SubtitleTrack } from '../../../types';

export const DEFAULT_SUBTITLE_STYLE: SubtitleStyle = {
    position: 'bottom',
    color: 'white',
    highlightColor: 'yellow',
    outlineColor: 'black',
};

const NAMED_COLORS: Record<string, string> = {
    white: '#FFFFFF',
    black: '#000000',
    yellow: '#FFFF00',
    red: '#FF0000',
    green: '#00FF00',
    blue: '#0000FF',
    cyan: '#00FFFF',
    magenta: '#FF00FF',
    orange: '#FFA500',
};

export interface AssOptions {
    size: Size;
    font: FontResource;
    fontSize: number;
    style?: SubtitleStyle;
}

// '#RRGGBB', '#RGB' or a basic colour name to ASS 'BBGGRR'
export function toAssColor(color: string): string {
    const value = NAMED_COLORS[color.trim().toLowerCase()] ?? color.trim();
    let hex = value.replace(/^#/, '');
    if (/^[0-9a-fA-F]{3}$/.test(hex)) hex = hex.split('').map(c => c + c).join('');
    if (!/^[0-9a-fA-F]{6}$/.test(hex)) {
        throw new Error(`Unsupported subtitle colour: ${color}`);
    }
    const [r, g, b] = [hex.slice(0, 2), hex.slice(2, 4), hex.slice(4, 6)];
    return `${b}${g}${r}`.toUpperCase();
}

// H:MM:SS.cc
export function formatAssTime(seconds: number): string {
    const cs = Math.max(0, Math.round(seconds * 100));
    const h = Math.floor(cs / 360000);
    const m = Math.floor((cs % 360000) / 6000);
    const s = Math.floor((cs % 6000) / 100);
    const c = cs % 100;
    const pad = (n: number) => String(n).padStart(2, '0');
    return `${h}:${pad(m)}:${pad(s)}.${pad(c)}`;
}

// A word joiner after each backslash keeps libass from reading \N, \n or \h in user text
export const escapeAss = (str: string) =>
    str.replace(/\\/g, '\\\u2060').replace(/\{/g, '\\{').replace(/\}/g, '\\}').replace(/\n/g, '\\N');

export function cueToAssText(cue: SubtitleCue, highlightColor: string): string {
    if (cue.kind === 'block') return escapeAss(cue.text);
    return cue.run
        .map(w => (w.highlighted ? `{\\c&H${highlightColor}&}${escapeAss(w.text)}{\\r}` : escapeAss(w.text)))
        .join(' ');
}

function alignmentFor(style: SubtitleStyle, height: number): { alignment: number; marginV: number } {
    switch (style.position) {
        case 'top':
            return { alignment: 8, marginV: Math.round(height * 0.1) };
        case 'center':
            return { alignment: 5, marginV: 0 };
        case 'bottom':
            return { alignment: 2, marginV: Math.round(height * 0.2) };
    }
}

// Advanced Substation Alpha script with one event per cue
export function buildAssScript(track: SubtitleTrack, options: AssOptions): string {
    const { size, font, fontSize } = options;
    const style = options.style ?? DEFAULT_SUBTITLE_STYLE;
    const { alignment, marginV } = alignmentFor(style, size.height);
    const marginH = Math.round(size.width * 0.05);
    const highlight = toAssColor(style.highlightColor);

    let content = `[Script Info]
ScriptType: v4.00+
PlayResX: ${size.width}
PlayResY: ${size.height}
WrapStyle: 0
ScaledBorderAndShadow: yes

[V4+ Styles]
Format: Name, Fontname, Fontsize, PrimaryColour, SecondaryColour, OutlineColour, BackColour, Bold, Italic, Underline, StrikeOut, ScaleX, ScaleY, Spacing, Angle, BorderStyle, Outline, Shadow, Alignment, MarginL, MarginR, MarginV, Encoding
Style: Default,${font.family},${fontSize},&H00${toAssColor(style.color)},&H00${highlight},&H00${toAssColor(style.outlineColor)},&H80000000,0,0,0,0,100,100,0,0,1,2,0,${alignment},${marginH},${marginH},${marginV},1

[Events]
Format: Layer, Start, End, Style, Name, MarginL, MarginR, MarginV, Effect, Text
`;

    for (const cue of track.cues) {
        const start = formatAssTime(cue.start);
        const end = formatAssTime(cue.end);
        if (start === end) continue;
        content += `Dialogue: 0,${start},${end},Default,,0,0,0,,${cueToAssText(cue, highlight)}\n`;
    }
    return content;
}

export function writeAssFile(filePath: string, track: SubtitleTrack, options: AssOptions): void {
    fs.writeFileSync(filePath, buildAssScript(track, options));
}

// Escape a path for use inside an ffmpeg filter argument
export const escapeFilterPath = (p: string) => p.replace(/\\/g, '/').replace(/:/g, '\\:').replace(/'/g, "\\'");
