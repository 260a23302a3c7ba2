import type { Request, Response } from 'express';
import type { BackendResolver } from '../../services/backend-resolver.js';
import type { DispatchForwarder } from '../../services/dispatch-forwarder.js';
import { ClientInputError } from '../../types/errors.js';
import { getRawRequestBody, isObjectRecord, mapError, sendError } from '../shared.js';

export interface PassthroughDeps {
    resolver: BackendResolver;
    forwarder: DispatchForwarder;
}

/** Falsy values plus empty arrays and objects count as an absent model. */
function isMissingModel(model: unknown): boolean {
    if (Array.isArray(model)) {
        return model.length === 0;
    }
    if (isObjectRecord(model)) {
        return Object.keys(model).length === 0;
    }
    return !model;
}

function requireModelName(body: unknown): string {
    const model = isObjectRecord(body) ? body.model : undefined;
    if (isMissingModel(model)) {
        throw new ClientInputError('Request must include model');
    }
    // A non-string model cannot match any name and is reported as unknown.
    return typeof model === 'string' ? model : JSON.stringify(model);
}

/**
 * POST /v1/chat/completions, POST /v1/completions — forward the untouched
 * body to the backend serving `model` and relay the upstream reply byte for
 * byte, error statuses included.
 */
export function handlePassthrough(deps: PassthroughDeps) {
    return async (req: Request, res: Response): Promise<void> => {
        let backend: string;
        try {
            backend = deps.resolver.resolveOrThrow(requireModelName(req.body));
        } catch (error) {
            const { status, message } = mapError(error);
            sendError(res, message, status);
            return;
        }

        const authorization = req.get('authorization');
        const result = await deps.forwarder.relay({
            backend,
            path: req.path,
            method: req.method,
            body: getRawRequestBody(req),
            authorization: authorization || undefined,
        });

        res.status(result.statusCode);
        res.setHeader('Content-Type', result.contentType);
        res.end(result.body);
    };
}
