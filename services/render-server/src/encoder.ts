import ffmpeg from 'fluent-ffmpeg';
import { once } from 'events';
import { PassThrough } from 'stream';
import { AudioTrack, MusicTrack, RenderFrame, Size } from '../../../types';
import { RenderError, errorMessage } from '../../../utils/errors';
import { escapeFilterPath } from './ass';
import { encoderLogger } from './logger';

export const DEFAULT_MUSIC_VOLUME = 0.15;

export interface EncoderSettings {
    outputPath: string;
    size: Size;
    fps: number;
    duration: number;
    audio: AudioTrack;
    music?: MusicTrack;
    subtitles?: { assPath: string; fontsDir: string };
}

/**
 * Sequential sink: frames must arrive in index order.
 * Each frame carries its active cue for encoders that draw subtitles themselves;
 * `FfmpegEncoder` ignores it and burns in the ASS script from `settings.subtitles`.
 */
export interface FrameEncoder {
    write(frame: RenderFrame): Promise<void>;
    finish(): Promise<void>;
    abort(): Promise<void>;
}

export type EncoderFactory = (settings: EncoderSettings) => FrameEncoder;

export function configureFfmpeg(paths: { ffmpegPath?: string; ffprobePath?: string }): void {
    if (paths.ffmpegPath) ffmpeg.setFfmpegPath(paths.ffmpegPath);
    if (paths.ffprobePath) ffmpeg.setFfprobePath(paths.ffprobePath);
}

export function buildFilterGraph(settings: EncoderSettings): string[] {
    const filters: string[] = [];
    const { subtitles, music } = settings;

    let video = '[0:v]format=yuv420p';
    if (subtitles) {
        video += `,subtitles=filename='${escapeFilterPath(subtitles.assPath)}':fontsdir='${escapeFilterPath(subtitles.fontsDir)}'`;
    }
    filters.push(`${video}[v_out]`);

    // Narration is padded with silence so it never ends before the pictures; -t trims the tail
    const narration = '[1:a]aformat=sample_rates=44100:channel_layouts=stereo,apad';
    if (music) {
        filters.push(`${narration}[a_narration]`);
        filters.push(`[2:a]aformat=sample_rates=44100:channel_layouts=stereo,volume=${music.volume}[a_music]`);
        filters.push('[a_narration][a_music]amix=inputs=2:duration=first:dropout_transition=0[a_out]');
    } else {
        filters.push(`${narration}[a_out]`);
    }
    return filters;
}

export function buildOutputOptions(settings: EncoderSettings): string[] {
    return [
        '-map', '[v_out]',
        '-map', '[a_out]',
        '-c:v', 'libx264',
        '-preset', 'medium',
        '-crf', '20',
        '-r', `${settings.fps}`,
        '-c:a', 'aac',
        '-b:a', '192k',
        '-t', settings.duration.toFixed(3),
        '-movflags', '+faststart',
        '-fflags', '+bitexact',
        '-flags:v', '+bitexact',
        '-flags:a', '+bitexact',
    ];
}

/**
 * Feeds raw RGBA frames to ffmpeg over stdin and muxes them with the narration
 * (and optional looping music) into one mp4 at `outputPath`.
 */
export class FfmpegEncoder implements FrameEncoder {
    private readonly frames = new PassThrough();
    private readonly command: ffmpeg.FfmpegCommand;
    private readonly done: Promise<void>;
    private readonly frameBytes: number;
    private failure: Error | null = null;
    private aborted = false;

    constructor(private readonly settings: EncoderSettings) {
        const { size, fps, audio, music } = settings;
        this.frameBytes = size.width * size.height * 4;

        const cmd = ffmpeg()
            .input(this.frames)
            .inputFormat('rawvideo')
            .inputOptions(['-pix_fmt', 'rgba', '-s', `${size.width}x${size.height}`, '-framerate', `${fps}`])
            .input(audio.path);

        if (music) {
            cmd.input(music.path).inputOptions(['-stream_loop', '-1']);
        }

        cmd.complexFilter(buildFilterGraph(settings))
            .outputOptions(buildOutputOptions(settings))
            .format('mp4');

        this.done = new Promise<void>((resolve, reject) => {
            cmd.on('start', (commandLine: string) => encoderLogger.debug('ffmpeg started', { commandLine }))
                .on('end', () => resolve())
                .on('error', (err: Error) => {
                    this.failure = err;
                    reject(err);
                });
        });
        // Failures are reported through write() and finish(); keep the rejection handled until then
        this.done.catch((err: unknown) => encoderLogger.debug('ffmpeg exited with an error', { error: errorMessage(err) }));

        this.command = cmd;
        cmd.save(settings.outputPath);
    }

    async write(frame: RenderFrame): Promise<void> {
        if (this.failure) {
            throw new RenderError('encoder', `Encoder failed: ${this.failure.message}`, this.failure);
        }
        const { data } = frame.image;
        if (data.byteLength !== this.frameBytes) {
            throw new RenderError('encoder', `Frame ${frame.index} has ${data.byteLength} bytes, expected ${this.frameBytes}`);
        }
        const accepted = this.frames.write(Buffer.from(data.buffer, data.byteOffset, data.byteLength));
        if (!accepted) {
            // Backpressure: wait until ffmpeg has taken the buffered frames
            try {
                await Promise.race([once(this.frames, 'drain'), this.done]);
            } catch (err) {
                throw new RenderError('encoder', `Encoder failed: ${errorMessage(err)}`, err);
            }
        }
    }

    async finish(): Promise<void> {
        this.frames.end();
        try {
            await this.done;
        } catch (err) {
            throw new RenderError('encoder', `Encoder failed: ${errorMessage(err)}`, err);
        }
    }

    async abort(): Promise<void> {
        if (this.aborted) return;
        this.aborted = true;
        this.command.kill('SIGKILL');
        this.frames.destroy();
        await this.done.then(
            () => undefined,
            (err: unknown) => encoderLogger.debug('ffmpeg stopped', { outputPath: this.settings.outputPath, error: errorMessage(err) })
        );
    }
}

export const createFfmpegEncoder: EncoderFactory = settings => new FfmpegEncoder(settings);
