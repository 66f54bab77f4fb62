import fs from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { RenderError, errorMessage } from '../../../utils/errors';
import { RenderServerConfig } from './config';
import { Logger, serverLogger } from './logger';
import { RenderManifest, prepareStoryInput } from './manifest';
import { RenderResult, StoryRenderInput, renderStory } from './renderer';

export type JobStatus = 'processing' | 'completed' | 'error' | 'cancelled';

export interface JobFailure {
    kind: string; // error class, e.g. InvalidTimelineError
    code?: string;
    message: string;
}

export interface RenderJob {
    id: string;
    status: JobStatus;
    createdAt: number;
    dir: string;
    progress: number; // 0..1
    path?: string;
    error?: JobFailure;
    controller: AbortController;
}

export interface JobDeps {
    prepare: (manifest: RenderManifest, config: RenderServerConfig, outputDir: string) => Promise<StoryRenderInput>;
    render: (input: StoryRenderInput) => Promise<RenderResult>;
    logger: Logger;
}

const defaultDeps: JobDeps = { prepare: prepareStoryInput, render: renderStory, logger: serverLogger };

export function describeFailure(err: unknown): JobFailure {
    if (err instanceof RenderError) return { kind: err.name, code: err.code, message: err.message };
    if (err instanceof Error) return { kind: err.name, message: err.message };
    return { kind: 'Error', message: String(err) };
}

export class JobStore {
    private readonly jobs = new Map<string, RenderJob>();

    constructor(
        private readonly rootDir: string,
        private readonly ttlMs: number,
        private readonly now: () => number = () => Date.now()
    ) {}

    create(): RenderJob {
        const id = uuidv4();
        const job: RenderJob = {
            id,
            status: 'processing',
            createdAt: this.now(),
            dir: path.join(this.rootDir, id),
            progress: 0,
            controller: new AbortController(),
        };
        this.jobs.set(id, job);
        return job;
    }

    get(id: string): RenderJob | undefined {
        return this.jobs.get(id);
    }

    get size(): number {
        return this.jobs.size;
    }

    cancel(id: string): boolean {
        const job = this.jobs.get(id);
        if (!job || job.status !== 'processing') return false;
        job.controller.abort();
        return true;
    }

    // Drops jobs older than the TTL together with their output folder
    sweep(): string[] {
        const expired: string[] = [];
        const now = this.now();
        for (const [id, job] of this.jobs.entries()) {
            if (now - job.createdAt <= this.ttlMs) continue;
            job.controller.abort();
            fs.rmSync(job.dir, { recursive: true, force: true });
            this.jobs.delete(id);
            expired.push(id);
        }
        return expired;
    }

    startSweeper(intervalMs: number = this.ttlMs): NodeJS.Timeout {
        const timer = setInterval(() => {
            try {
                const expired = this.sweep();
                if (expired.length > 0) serverLogger.info('Expired jobs removed', { count: expired.length });
            } catch (err) {
                serverLogger.error('Job cleanup failed', err);
            }
        }, intervalMs);
        timer.unref();
        return timer;
    }
}

export function jobStatusView(job: RenderJob) {
    return {
        jobId: job.id,
        status: job.status,
        progress: Math.round(job.progress * 100) / 100,
        error: job.error,
    };
}

export async function runJob(
    job: RenderJob,
    manifest: RenderManifest,
    config: RenderServerConfig,
    deps: JobDeps = defaultDeps
): Promise<void> {
    const { logger } = deps;
    try {
        await fs.promises.mkdir(job.dir, { recursive: true });
        const input = await deps.prepare(manifest, config, job.dir);
        const result = await deps.render({
            ...input,
            jobId: job.id,
            signal: job.controller.signal,
            onProgress: (written, total) => {
                job.progress = total > 0 ? written / total : 1;
            },
        });
        job.status = 'completed';
        job.progress = 1;
        job.path = result.outputPath;
        logger.info('Job completed', { jobId: job.id, outputPath: result.outputPath, frames: result.frames });
    } catch (err) {
        const cancelled = job.controller.signal.aborted || (err instanceof RenderError && err.code === 'cancelled');
        job.status = cancelled ? 'cancelled' : 'error';
        job.error = describeFailure(err);
        if (cancelled) logger.warn('Job cancelled', { jobId: job.id });
        else logger.error(`Job failed: ${errorMessage(err)}`, err, { jobId: job.id });
    }
}
