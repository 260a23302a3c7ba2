import type { Request, Response } from 'express';
import type { BackendResolver } from '../../services/backend-resolver.js';
import type { RouteClassifier } from '../../services/route-classifier.js';
import type { DispatchForwarder } from '../../services/dispatch-forwarder.js';
import type { RouteResponseBody, WorkerResponse } from '../../types/dispatch.js';
import { ClientInputError } from '../../types/errors.js';
import { isObjectRecord, mapError, sendError, sendJson } from '../shared.js';

export const DISPATCH_BACKEND_LABEL = 'trtllm-serve';

export interface RouteDeps {
    resolver: BackendResolver;
    classifier: RouteClassifier;
    forwarder: DispatchForwarder;
}

interface RouteRequestInput {
    text: string;
    hasImage: boolean;
    imageUrl?: string;
    imagePath?: string;
}

function optionalString(value: unknown): string | undefined {
    return typeof value === 'string' && value !== '' ? value : undefined;
}

function parseRouteRequest(body: unknown): RouteRequestInput {
    const payload = isObjectRecord(body) ? body : {};
    const rawText = payload.text;
    const text = rawText === undefined || rawText === null ? '' : String(rawText).trim();
    if (!text) {
        throw new ClientInputError('text is required');
    }

    const imageUrl = optionalString(payload.image_url);
    const imagePath = optionalString(payload.image_path);
    return {
        text,
        hasImage: Boolean(payload.has_image) || Boolean(imageUrl) || Boolean(imagePath),
        imageUrl,
        imagePath,
    };
}

/**
 * POST /route — classify free text, invoke the chosen backend and report both
 * the routing decision and the worker outcome. Backend failures still answer
 * 200; they show up in `worker_status`.
 */
export function handleRoute(deps: RouteDeps) {
    return async (req: Request, res: Response): Promise<void> => {
        let input: RouteRequestInput;
        try {
            input = parseRouteRequest(req.body);
        } catch (error) {
            const { status, message } = mapError(error);
            sendError(res, message, status);
            return;
        }

        const decision = deps.classifier.classify(input.text, input.hasImage);
        const target = decision.targetModel;
        // Classifier targets are always one of the two configured identities.
        const targetAlias = deps.resolver.aliasFor(target.canonicalId) ?? target.canonicalId;
        const workerResult = await deps.forwarder.invoke({
            text: input.text,
            model: target.canonicalId,
            imageUrl: input.imageUrl,
            imagePath: input.imagePath,
        });

        let workerStatus: string;
        let workerResponse: WorkerResponse;
        if (workerResult.ok) {
            workerStatus = 'ok';
            workerResponse = {
                details: {
                    target_model: target.canonicalId,
                    target_alias: targetAlias,
                    result: workerResult.result,
                },
            };
        } else {
            workerStatus = `error: ${workerResult.error}`;
            workerResponse = { details: { error: workerResult.error } };
        }

        const body: RouteResponseBody = {
            model: target.canonicalId,
            confidence: decision.confidence,
            source: decision.source,
            probabilities: decision.probabilities,
            top_k_models: decision.rankedCandidates,
            dispatch_target: targetAlias,
            dispatch_backend: DISPATCH_BACKEND_LABEL,
            worker_invoked: true,
            worker_status: workerStatus,
            worker_response: workerResponse,
        };
        sendJson(res, body);
    };
}
