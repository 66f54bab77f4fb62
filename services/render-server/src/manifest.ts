import path from 'path';
import { z } from 'zod';
import { WordTiming } from '../../../types';
import { parseTranscript } from '../../../utils/subtitles';
import { assertValidDurations } from '../../../utils/timeline';
import { toAssColor } from './ass';
import { loadFont, loadStillImage } from './assets';
import { RenderServerConfig } from './config';
import { DEFAULT_MUSIC_VOLUME } from './encoder';
import { DEFAULT_FONT_SIZE, StoryRenderInput } from './renderer';

const isSupportedColor = (value: string) => {
    try {
        toAssColor(value);
        return true;
    } catch {
        return false;
    }
};

const colorSchema = z.string().refine(isSupportedColor, { message: 'Expected #RRGGBB, #RGB or a basic colour name' });

export const renderManifestSchema = z.object({
    title: z.string().optional(),
    outputName: z.string().regex(/^[A-Za-z0-9_-]+$/).optional(),
    seed: z.number().int().optional(),
    overlap: z.number().optional(),
    fps: z.number().positive().max(120).optional(),
    segments: z.array(
        z.object({
            text: z.string(),
            image: z.string().min(1),
            duration: z.number(),
        })
    ),
    audio: z.string().min(1),
    words: z.array(z.object({ word: z.string(), start: z.number(), end: z.number() })).optional(),
    transcript: z.unknown().optional(),
    font: z.object({
        path: z.string().min(1),
        family: z.string().min(1),
    }),
    fontSize: z.number().positive().default(DEFAULT_FONT_SIZE),
    subtitle: z
        .object({
            position: z.enum(['top', 'center', 'bottom']).default('bottom'),
            color: colorSchema.default('white'),
            highlightColor: colorSchema.default('yellow'),
            outlineColor: colorSchema.default('black'),
        })
        .default({}),
    music: z
        .object({
            path: z.string().min(1),
            volume: z.number().min(0).max(1).default(DEFAULT_MUSIC_VOLUME),
        })
        .optional(),
});

export type RenderManifest = z.infer<typeof renderManifestSchema>;

export function parseManifest(body: unknown): RenderManifest {
    return renderManifestSchema.parse(body);
}

export function slugify(text: string): string {
    return text
        .toLowerCase()
        .replace(/[^a-z0-9\s-]/g, '')
        .replace(/[\s-]+/g, '-')
        .replace(/^-+|-+$/g, '');
}

export function outputFileName(manifest: RenderManifest): string {
    const name = manifest.outputName ?? slugify(manifest.title ?? '');
    return `${name || 'untitled-video'}.mp4`;
}

export function manifestWords(manifest: RenderManifest): WordTiming[] | null {
    if (manifest.words) return manifest.words;
    if (manifest.transcript !== undefined) return parseTranscript(manifest.transcript);
    return null;
}

/**
 * Turns a manifest into render input. Durations are checked before any image
 * is decoded so a malformed request fails without touching ffmpeg.
 */
export async function prepareStoryInput(
    manifest: RenderManifest,
    config: RenderServerConfig,
    outputDir: string
): Promise<StoryRenderInput> {
    const overlap = manifest.overlap ?? config.transitionOverlap;
    assertValidDurations(manifest.segments.map(s => s.duration), overlap);
    const words = manifestWords(manifest);
    const font = loadFont(manifest.font.path, manifest.font.family);

    const images = await Promise.all(manifest.segments.map(s => loadStillImage(s.image)));

    return {
        segments: manifest.segments.map((s, i) => ({ text: s.text, image: images[i], duration: s.duration })),
        words,
        audio: { path: manifest.audio },
        font,
        fontSize: manifest.fontSize,
        outputPath: path.join(outputDir, outputFileName(manifest)),
        output: config.output,
        seed: manifest.seed,
        overlap,
        fps: manifest.fps ?? config.fps,
        concurrency: config.concurrency,
        style: manifest.subtitle,
        music: manifest.music,
    };
}
