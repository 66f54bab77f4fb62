import express, { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import fs from 'fs';
import { ZodError } from 'zod';
import { InvalidTimelineError } from '../../../utils/errors';
import { assertValidDurations } from '../../../utils/timeline';
import { RenderServerConfig, loadConfig } from './config';
import { configureFfmpeg } from './encoder';
import { JobDeps, JobStore, jobStatusView, runJob } from './jobs';
import { serverLogger } from './logger';
import { parseManifest } from './manifest';

export function createApp(config: RenderServerConfig, jobs: JobStore, deps?: JobDeps) {
    const app = express();
    app.set('trust proxy', 1);

    // Middleware: Logger
    app.use((req, _res, next) => {
        serverLogger.info(`${req.method} ${req.url}`, { ip: req.ip });
        next();
    });

    const healthHandler = (_req: Request, res: Response) => {
        res.status(200).send('Render Server Online');
    };

    app.get('/', healthHandler);
    app.head('/', healthHandler);
    app.get('/health', healthHandler);

    app.use(cors({
        origin: '*',
        methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
    }));

    app.use(express.json({ limit: '10mb' }));

    app.post('/render', (req, res) => {
        // Validation errors surface to the error handler below as 400s
        const manifest = parseManifest(req.body);
        assertValidDurations(manifest.segments.map(s => s.duration), manifest.overlap ?? config.transitionOverlap);
        const job = jobs.create();
        serverLogger.info('Job started', { jobId: job.id, segments: manifest.segments.length });
        void runJob(job, manifest, config, deps);
        res.status(202).json({ jobId: job.id });
    });

    app.get('/status/:jobId', (req, res) => {
        const job = jobs.get(req.params.jobId);
        if (!job) {
            res.status(404).json({ error: 'Not Found' });
            return;
        }
        res.json(jobStatusView(job));
    });

    app.get('/download/:jobId', (req, res) => {
        const job = jobs.get(req.params.jobId);
        if (!job || job.status !== 'completed' || !job.path || !fs.existsSync(job.path)) {
            res.status(404).send('File not ready');
            return;
        }
        res.download(job.path, 'video.mp4');
    });

    app.delete('/render/:jobId', (req, res) => {
        const job = jobs.get(req.params.jobId);
        if (!job) {
            res.status(404).json({ error: 'Not Found' });
            return;
        }
        if (!jobs.cancel(job.id)) {
            res.status(409).json({ error: `Job is already ${job.status}` });
            return;
        }
        res.status(202).json(jobStatusView(job));
    });

    app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
        if (err instanceof ZodError) {
            res.status(400).json({ error: 'Invalid render manifest', issues: err.issues });
            return;
        }
        // express.json() reports unparsable bodies as SyntaxError
        if (err instanceof SyntaxError) {
            res.status(400).json({ error: 'Malformed JSON body' });
            return;
        }
        if (err instanceof InvalidTimelineError) {
            res.status(400).json({ error: err.message });
            return;
        }
        serverLogger.error('Request failed', err);
        res.status(500).json({ error: 'Internal Server Error' });
    });

    return app;
}

export function start(config: RenderServerConfig = loadConfig()) {
    configureFfmpeg(config);
    fs.mkdirSync(config.tempDir, { recursive: true });

    const jobs = new JobStore(config.tempDir, config.jobTtlMs);
    jobs.startSweeper();

    const app = createApp(config, jobs);
    const server = app.listen(config.port, () => {
        serverLogger.info(`Render Server live on port ${config.port}`, { tempDir: config.tempDir });
    });

    server.keepAliveTimeout = 120 * 1000;
    server.headersTimeout = 120 * 1000;

    const shutdown = () => {
        serverLogger.info('SIGTERM/SIGINT received: closing HTTP server');
        server.close(() => {
            serverLogger.info('HTTP server closed');
            process.exit(0);
        });
    };

    process.on('SIGTERM', shutdown);
    process.on('SIGINT', shutdown);
    return server;
}

if (require.main === module) {
    process.on('uncaughtException', err => {
        serverLogger.error('CRITICAL RENDER SERVER ERROR', err);
    });
    start();
}
