import express from 'express';

// =================================================================
// DEMO BACKENDS: simple services behind the gateway
// =================================================================
//
// Identical echo servers that say who they are, so the effect of
// zone preference, zone avoidance and scheme upgrades is visible in
// every response. The tests run them in process as upstreams.
//
//   GET /api/health → 200, or 503 after POST /api/health/down
//   GET /api/users  → fixed payload
//   ANY /*          → echo of method, path, query and host header
// =================================================================

export interface BackendOptions {
    zone?: string;
    /** Upper bound of a random per-request delay */
    maxDelayMs?: number;
}

export function createBackend(name: string, options: BackendOptions = {}): express.Express {
    const app = express();
    let healthy = true;

    app.use(express.json());

    if (options.maxDelayMs) {
        const maxDelayMs = options.maxDelayMs;
        app.use((_req, _res, next) => {
            setTimeout(next, Math.random() * maxDelayMs);
        });
    }

    app.get('/api/health', (_req, res) => {
        res.status(healthy ? 200 : 503).json({
            server: name,
            status: healthy ? 'healthy' : 'down',
        });
    });

    app.post('/api/health/:state', (req, res) => {
        healthy = req.params.state !== 'down';
        res.json({ server: name, healthy });
    });

    app.get('/api/users', (_req, res) => {
        res.json({
            server: name,
            zone: options.zone ?? null,
            data: [
                { id: 1, name: 'Alice' },
                { id: 2, name: 'Bob' },
                { id: 3, name: 'Charlie' },
            ],
        });
    });

    app.all('/{*path}', (req, res) => {
        res.json({
            server: name,
            zone: options.zone ?? null,
            method: req.method,
            path: req.path,
            query: req.query,
            host: req.headers.host ?? null,
        });
    });

    return app;
}
