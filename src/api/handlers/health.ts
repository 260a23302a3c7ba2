import type { Request, Response } from 'express';
import type { BackendResolver } from '../../services/backend-resolver.js';
import { sendJson } from '../shared.js';

export interface ModelsDeps {
    resolver: BackendResolver;
}

/** GET /health, GET /healthz — liveness only; backends are not probed. */
export function handleHealth() {
    return (_req: Request, res: Response): void => {
        sendJson(res, { status: 'ok' });
    };
}

/** GET /v1/models — the two canonical ids and their aliases. */
export function handleModels(deps: ModelsDeps) {
    return (_req: Request, res: Response): void => {
        sendJson(res, deps.resolver.listModels());
    };
}
