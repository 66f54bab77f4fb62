import os from 'os';
import path from 'path';
import { z } from 'zod';

const envSchema = z.object({
    PORT: z.coerce.number().int().positive().default(3002),
    RENDER_TEMP_DIR: z.string().min(1).default(path.join(os.tmpdir(), 'story-reel-render')),
    RENDER_WIDTH: z.coerce.number().int().positive().default(720),
    RENDER_HEIGHT: z.coerce.number().int().positive().default(1280),
    RENDER_FPS: z.coerce.number().positive().max(120).default(30),
    RENDER_CONCURRENCY: z.coerce.number().int().positive().default(Math.max(1, os.cpus().length)),
    TRANSITION_OVERLAP: z.coerce.number().nonnegative().default(1.0),
    JOB_TTL_MS: z.coerce.number().int().positive().default(30 * 60 * 1000),
    FFMPEG_PATH: z.string().min(1).optional(),
    FFPROBE_PATH: z.string().min(1).optional(),
});

export interface RenderServerConfig {
    port: number;
    tempDir: string;
    output: { width: number; height: number };
    fps: number;
    concurrency: number;
    transitionOverlap: number;
    jobTtlMs: number;
    ffmpegPath?: string;
    ffprobePath?: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): RenderServerConfig {
    // Unset and empty variables both fall back to defaults
    const present = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v !== ''));
    const result = envSchema.safeParse(present);
    if (!result.success) {
        const issues = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
        throw new Error(`Invalid render server configuration: ${issues}`);
    }
    const e = result.data;
    return {
        port: e.PORT,
        tempDir: e.RENDER_TEMP_DIR,
        output: { width: e.RENDER_WIDTH, height: e.RENDER_HEIGHT },
        fps: e.RENDER_FPS,
        concurrency: e.RENDER_CONCURRENCY,
        transitionOverlap: e.TRANSITION_OVERLAP,
        jobTtlMs: e.JOB_TTL_MS,
        ffmpegPath: e.FFMPEG_PATH,
        ffprobePath: e.FFPROBE_PATH,
    };
}
