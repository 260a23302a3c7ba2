import { createServer, type Server } from 'node:http';
import express, { type Express } from 'express';
import { handleHealth, handleModels } from './handlers/health.js';
import { handleTelemetrySnapshot } from './handlers/telemetry.js';
import { handleRoute } from './handlers/route.js';
import { handlePassthrough } from './handlers/passthrough.js';
import { handleStatic } from './handlers/static.js';
import { handleApiError, requestLogger, sendError, setRawRequestBody } from './shared.js';
import type { GatewayConfig } from '../config/config-loader.js';
import type { BackendResolver } from '../services/backend-resolver.js';
import type { RouteClassifier } from '../services/route-classifier.js';
import type { DispatchForwarder } from '../services/dispatch-forwarder.js';
import type { TelemetryCollector } from '../services/telemetry-collector.js';
import { logThought } from '../utils/logger.js';

export interface ApiServerDeps {
    config: Pick<GatewayConfig, 'port' | 'staticDir'>;
    resolver: BackendResolver;
    classifier: RouteClassifier;
    forwarder: DispatchForwarder;
    telemetry: TelemetryCollector;
}

// Chat payloads may carry inline base64 images.
const JSON_BODY_LIMIT = '64mb';

/**
 * Build the gateway HTTP app.
 *
 * Endpoints:
 *   GET  /health, /healthz      — Liveness
 *   GET  /v1/models             — Canonical ids and aliases
 *   GET  /telemetry/snapshot    — Host CPU/memory/GPU sample
 *   GET  /, /static/*           — Dashboard assets
 *   POST /route                 — Classify free text and dispatch it
 *   POST /v1/chat/completions   — Passthrough to the backend named by `model`
 *   POST /v1/completions        — Passthrough to the backend named by `model`
 */
export function createApiApp(deps: ApiServerDeps): Express {
    const app = express();
    app.disable('x-powered-by');

    // ── Global Middleware ───────────────────────────────────────────────────────
    app.use(requestLogger);

    // Bodies are JSON whatever the declared content type; the raw bytes are kept for passthrough.
    const parseJson = express.json({
        type: () => true,
        strict: false,
        limit: JSON_BODY_LIMIT,
        verify: setRawRequestBody,
    });

    // ── Routes ──────────────────────────────────────────────────────────────────
    app.get(['/health', '/healthz'], handleHealth());
    app.get('/v1/models', handleModels({ resolver: deps.resolver }));
    app.get('/telemetry/snapshot', handleTelemetrySnapshot({ collector: deps.telemetry }));
    app.get(['/', '/static/*'], handleStatic({ staticDir: deps.config.staticDir }));

    app.post('/route', parseJson, handleRoute({ resolver: deps.resolver, classifier: deps.classifier, forwarder: deps.forwarder }));
    app.post(
        ['/v1/chat/completions', '/v1/completions'],
        parseJson,
        handlePassthrough({ resolver: deps.resolver, forwarder: deps.forwarder }),
    );

    // ── Catch-all 404 (any other path or method) ───────────────────────────────
    app.use((_req, res) => {
        sendError(res, 'Not Found', 404);
    });
    app.use(handleApiError);

    return app;
}

/** Create the app and start listening on the configured port. */
export function startApiServer(deps: ApiServerDeps): Server {
    const app = createApiApp(deps);
    const server = createServer(app);

    server.listen(deps.config.port, '0.0.0.0', () => {
        console.log(`[Gateway] Listening on 0.0.0.0:${deps.config.port}`);
        void logThought(`[API] HTTP server started on port ${deps.config.port}.`);
    });

    return server;
}
