import express, { NextFunction, Request, Response } from 'express';
import fs from 'fs';
import path from 'path';
import { Server } from 'http';
import { z } from 'zod';
import { getConfig, loadConfig } from './config';
import { Metrics } from './modules/observability';
import { RankedResultBuilder } from './modules/ranker';
import { createOracle } from './modules/oracle';
import { AnalysisPipeline } from './pipeline';
import { EntityOracle } from './types';
import { toError, ValidationError } from './utils/errors';
import { Logger } from './utils/logger';

const AnalyzeBodySchema = z.object({
    url: z.string(),
});

export interface AppDeps {
    pipeline: AnalysisPipeline;
    oracle: EntityOracle;
    staticDir: string;
}

/** Only absolute http(s) URLs go through the pipeline. */
export function validateAnalyzeBody(body: unknown): string {
    const parsed = AnalyzeBodySchema.safeParse(body);
    if (!parsed.success) {
        throw new ValidationError('URL not provided');
    }
    const { url } = parsed.data;
    if (!url.startsWith('http://') && !url.startsWith('https://')) {
        throw new ValidationError('Invalid URL');
    }
    return url;
}

function isBodyParseError(err: unknown): boolean {
    return typeof err === 'object' && err !== null && 'type' in err && err.type === 'entity.parse.failed';
}

export function createApp(deps: AppDeps): express.Express {
    const app = express();
    const staticDir = path.resolve(deps.staticDir);
    const indexPath = path.join(staticDir, 'index.html');

    app.use((req, res, next) => {
        res.setHeader('Access-Control-Allow-Origin', '*');
        res.setHeader('Access-Control-Allow-Methods', 'GET,POST,OPTIONS');
        res.setHeader('Access-Control-Allow-Headers', 'Content-Type');
        if (req.method === 'OPTIONS') {
            res.sendStatus(204);
            return;
        }
        next();
    });

    app.use(express.json());

    app.post('/api/analyze', async (req, res, next) => {
        let url: string;
        try {
            url = validateAnalyzeBody(req.body);
        } catch (error) {
            if (error instanceof ValidationError) {
                Metrics.record('invalid_request');
                res.status(400).json({ error: true, message: error.message });
                return;
            }
            next(error);
            return;
        }

        try {
            Logger.info(`[API] Analyzing ${url}`, { url });
            const outcome = await deps.pipeline.analyze(url);
            res.json(RankedResultBuilder.toResponse(outcome));
        } catch (error) {
            next(error);
        }
    });

    app.get('/health', (req, res) => {
        res.json({
            status: 'ok',
            model_status: deps.oracle.isLoaded() ? 'loaded' : 'not_loaded',
        });
    });

    app.get('/metrics', async (req, res, next) => {
        try {
            res.set('Content-Type', Metrics.registry.contentType);
            res.end(await Metrics.registry.metrics());
        } catch (error) {
            next(error);
        }
    });

    app.use(express.static(staticDir));

    // Unknown paths fall back to the front-end entry point.
    app.get('*', (req, res) => {
        if (fs.existsSync(indexPath)) {
            res.sendFile(indexPath);
        } else {
            res.status(404).json({ error: true, message: 'Not found' });
        }
    });

    app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
        if (isBodyParseError(err)) {
            Metrics.record('invalid_request');
            res.status(400).json({ error: true, message: 'URL not provided' });
            return;
        }
        Metrics.record('internal_error');
        Logger.logError(`[API] ${req.method} ${req.path} failed`, toError(err));
        res.status(500).json({ error: true, message: 'Internal server error' });
    });

    return app;
}

/**
 * Boots the service: config, classifier (loaded once, shared read-only by every
 * request), then the HTTP listener.
 */
export async function startServer(options: { port?: number; configPath?: string } = {}): Promise<Server> {
    loadConfig(options.configPath);
    const config = getConfig();

    const oracle = createOracle(config);
    Logger.info(`[Server] Loading entity classifier (${oracle.name})...`);
    await oracle.load();
    if (!oracle.isLoaded()) {
        Logger.warn('[Server] Entity classifier unavailable, analyses will return empty results');
    }

    Metrics.enableDefaultMetrics();

    const pipeline = new AnalysisPipeline({ oracle });
    const app = createApp({ pipeline, oracle, staticDir: config.server.static_dir });
    const port = options.port ?? config.server.port;

    return new Promise(resolve => {
        const server = app.listen(port, () => {
            Logger.info(`🚀 Product title analyzer running at http://localhost:${port}`);
            Logger.info('   POST /api/analyze  - rank product names found on a page');
            Logger.info('   GET  /health       - service and classifier status');
            resolve(server);
        });
    });
}
