import fs from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import {
    AudioTrack,
    FontResource,
    MusicTrack,
    RenderFrame,
    SegmentInput,
    Size,
    SubtitleStyle,
    SubtitleTrack,
    Timeline,
    WordTiming,
} from '../../../types';
import { Compositor, createCompositor, frameCount } from '../../../utils/crossfade';
import { InvalidTimelineError, RenderError, SubtitleCoverageError, errorMessage } from '../../../utils/errors';
import { activeCue, assertTrackCoverage, buildSubtitleTrack } from '../../../utils/subtitles';
import { buildTimeline } from '../../../utils/timeline';
import { DEFAULT_SUBTITLE_STYLE, writeAssFile } from './ass';
import { EncoderFactory, FrameEncoder, createFfmpegEncoder } from './encoder';
import { AbortedError, runOrdered } from './framePool';
import { Logger, rendererLogger } from './logger';

export const DEFAULT_FPS = 30;
export const DEFAULT_FONT_SIZE = 40;

export interface RenderOptions {
    fps?: number;
    concurrency?: number;
    style?: SubtitleStyle;
    music?: MusicTrack;
    signal?: AbortSignal;
    encoder?: EncoderFactory;
    logger?: Logger;
    jobId?: string;
    onProgress?: (framesWritten: number, totalFrames: number) => void;
}

export interface RenderRequest extends RenderOptions {
    timeline: Timeline;
    compositor: Compositor;
    subtitles: SubtitleTrack;
    audio: AudioTrack;
    font: FontResource;
    fontSize: number;
    outputPath: string;
}

export interface RenderResult {
    outputPath: string;
    frames: number;
    duration: number;
}

export interface StoryRenderInput extends RenderOptions {
    segments: SegmentInput[];
    words?: WordTiming[] | null;
    audio: AudioTrack;
    font: FontResource;
    fontSize?: number;
    outputPath: string;
    output: Size;
    seed?: number;
    overlap?: number;
}

function toRenderError(err: unknown): Error {
    if (err instanceof RenderError || err instanceof InvalidTimelineError || err instanceof SubtitleCoverageError) {
        return err;
    }
    if (err instanceof AbortedError) {
        return new RenderError('cancelled', 'Render was cancelled', err);
    }
    return new RenderError('encoder', `Render failed: ${errorMessage(err)}`, err);
}

async function removeIfPresent(filePath: string, logger: Logger): Promise<void> {
    try {
        await fs.promises.rm(filePath, { force: true });
    } catch (err) {
        logger.warn('Could not remove temporary file', { filePath, error: errorMessage(err) });
    }
}

function validateRequest(request: RenderRequest, fps: number): void {
    const total = request.timeline.totalDuration();
    if (!(total > 0)) {
        throw new InvalidTimelineError(`Timeline duration must be positive, got ${total}`);
    }
    if (request.compositor.timeline !== request.timeline) {
        throw new RenderError('input', 'Compositor was built for a different timeline');
    }
    if (!Number.isFinite(fps) || fps <= 0) {
        throw new RenderError('input', `Frame rate must be positive, got ${fps}`);
    }
    if (!Number.isFinite(request.fontSize) || request.fontSize <= 0) {
        throw new RenderError('input', `Font size must be positive, got ${request.fontSize}`);
    }
    if (!request.outputPath) {
        throw new RenderError('input', 'Output path is required');
    }
    assertTrackCoverage(request.subtitles, total);
}

/**
 * Samples every frame of the timeline, pairs it with its active cue and feeds
 * the encoder in frame order. Output goes to a temporary file beside
 * `outputPath` and is renamed only after the encoder finished; any failure or
 * cancellation removes it and leaves `outputPath` untouched.
 */
export async function render(request: RenderRequest): Promise<RenderResult> {
    const fps = request.fps ?? DEFAULT_FPS;
    const logger = request.logger ?? rendererLogger;
    validateRequest(request, fps);

    const { timeline, compositor, subtitles, font, fontSize, signal } = request;
    const total = timeline.totalDuration();
    const count = frameCount(total, fps);
    const outputPath = path.resolve(request.outputPath);
    const dir = path.dirname(outputPath);
    const stem = path.basename(outputPath, path.extname(outputPath));
    const runId = uuidv4();
    const tempPath = path.join(dir, `.${stem}.partial-${runId}${path.extname(outputPath) || '.mp4'}`);
    const assPath = path.join(dir, `.${stem}.${runId}.ass`);
    const context = { jobId: request.jobId, frames: count, outputPath };

    if (signal?.aborted) throw new RenderError('cancelled', 'Render was cancelled before it started');

    try {
        await fs.promises.mkdir(dir, { recursive: true });
        writeAssFile(assPath, subtitles, {
            size: compositor.output,
            font,
            fontSize,
            style: request.style ?? DEFAULT_SUBTITLE_STYLE,
        });
    } catch (err) {
        await removeIfPresent(assPath, logger);
        throw new RenderError('output', `Cannot prepare output in ${dir}: ${errorMessage(err)}`, err);
    }

    let encoder: FrameEncoder;
    try {
        encoder = (request.encoder ?? createFfmpegEncoder)({
            outputPath: tempPath,
            size: compositor.output,
            fps,
            duration: total,
            audio: request.audio,
            music: request.music,
            subtitles: { assPath, fontsDir: path.dirname(path.resolve(font.path)) },
        });
    } catch (err) {
        await removeIfPresent(assPath, logger);
        throw new RenderError('encoder', `Cannot start encoder: ${errorMessage(err)}`, err);
    }

    const progressStep = Math.max(1, Math.floor(count / 10));

    try {
        await logger.timed('Render', async () => {
            await runOrdered<RenderFrame>({
                count,
                concurrency: request.concurrency ?? 1,
                signal,
                produce: index => {
                    const t = index / fps;
                    return { index, t, image: compositor.sampleAt(t), cue: activeCue(subtitles, t) };
                },
                consume: async (index, frame) => {
                    await encoder.write(frame);
                    const written = index + 1;
                    request.onProgress?.(written, count);
                    if (written % progressStep === 0 || written === count) {
                        logger.debug('Frames written', { ...context, written });
                    }
                },
            });
            await encoder.finish();
            if (signal?.aborted) throw new AbortedError();
            try {
                await fs.promises.rename(tempPath, outputPath);
            } catch (err) {
                throw new RenderError('output', `Cannot move render into place at ${outputPath}: ${errorMessage(err)}`, err);
            }
        }, context);
    } catch (err) {
        await encoder.abort();
        await removeIfPresent(tempPath, logger);
        throw toRenderError(err);
    } finally {
        await removeIfPresent(assPath, logger);
    }

    return { outputPath, frames: count, duration: total };
}

// Builds timeline, compositor and subtitle track from finished story assets, then renders
export async function renderStory(input: StoryRenderInput): Promise<RenderResult> {
    const timeline = buildTimeline(input.segments, { overlap: input.overlap, seed: input.seed });
    const compositor = createCompositor(timeline, input.output);
    const subtitles = buildSubtitleTrack(timeline, input.words);
    return render({
        ...input,
        timeline,
        compositor,
        subtitles,
        fontSize: input.fontSize ?? DEFAULT_FONT_SIZE,
    });
}
