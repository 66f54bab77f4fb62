
export type MotionPattern = 'zoom-in' | 'zoom-out' | 'pan-left' | 'pan-right' | 'pan-up' | 'pan-down';
export type SubtitlePosition = 'top' | 'center' | 'bottom';

export interface Size {
    width: number;
    height: number;
}

// Decoded still or composited frame, 4 bytes per pixel (RGBA), row-major
export interface RasterImage extends Size {
    data: Uint8ClampedArray;
}

// Normalized crop bounds (0.0 - 1.0) relative to the image's cover region
export interface CropRect {
    left: number;
    top: number;
    right: number;
    bottom: number;
}

// Source-pixel rectangle actually sampled for a frame
export interface PixelRect {
    x: number;
    y: number;
    width: number;
    height: number;
}

export interface MotionDescriptor {
    pattern: MotionPattern;
    from: CropRect;
    to: CropRect;
}

export interface WordTiming {
    word: string;
    start: number; // seconds on the narration clock
    end: number;   // seconds on the narration clock
}

export interface SegmentInput {
    text: string;
    image: RasterImage;
    duration: number; // seconds, from audio alignment
}

export interface Segment {
    index: number;
    text: string;
    image: RasterImage;
    start: number;
    end: number;
    duration: number;
    motion: MotionDescriptor;
}

export interface Transition {
    from: number; // segment index
    to: number;
    start: number; // overlap window on the timeline
    end: number;
    duration: number;
}

export interface TimeWindow {
    start: number;
    end: number;
}

export interface Timeline {
    readonly segments: readonly Segment[];
    readonly transitions: readonly Transition[];
    readonly overlap: number;
    readonly seed: number;
    durationAt(index: number): TimeWindow;
    totalDuration(): number;
}

export interface KaraokeWord {
    text: string;
    highlighted: boolean;
}

export interface BlockCue {
    kind: 'block';
    start: number;
    end: number;
    segmentIndex: number;
    text: string;
}

export interface WordCue {
    kind: 'word';
    start: number;
    end: number;
    segmentIndex: number;
    wordIndex: number; // position of the word within its segment
    text: string;
    run: KaraokeWord[]; // words revealed so far, current one highlighted
}

export type SubtitleCue = BlockCue | WordCue;

export interface SubtitleTrack {
    mode: 'block' | 'word';
    cues: SubtitleCue[];
}

export interface SubtitleStyle {
    position: SubtitlePosition;
    color: string;
    highlightColor: string;
    outlineColor: string;
}

export interface FontResource {
    path: string;   // .ttf / .otf file
    family: string; // family name stored in the font file
}

export interface AudioTrack {
    path: string;
}

export interface MusicTrack {
    path: string;
    volume: number; // 0.0 to 1.0
}

export interface RenderFrame {
    index: number;
    t: number;
    image: RasterImage;
    cue: SubtitleCue;
}
