import type { Request, Response, NextFunction } from 'express';
import type { IncomingMessage } from 'node:http';
import { randomUUID } from 'node:crypto';
import { GatewayError } from '../types/errors.js';
import { logThought, scrubSensitiveText } from '../utils/logger.js';

type RawBodyRequest = IncomingMessage & { rawBody?: Buffer };

const EMPTY_JSON_BODY = Buffer.from('{}');

/** body-parser `verify` hook: keep the exact inbound bytes for passthrough relays. */
export function setRawRequestBody(req: IncomingMessage, _res: unknown, buffer: Buffer): void {
    (req as RawBodyRequest).rawBody = Buffer.from(buffer);
}

/** Inbound body bytes; an empty body reads as `{}`. */
export function getRawRequestBody(req: Request): Buffer {
    const rawBody = (req as RawBodyRequest).rawBody;
    return rawBody && rawBody.length > 0 ? rawBody : EMPTY_JSON_BODY;
}

export function isObjectRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ── Response Helpers ────────────────────────────────────────────────────────

/** Send a JSON body as-is. The gateway's wire format carries no envelope. */
export function sendJson<T>(res: Response, body: T, status = 200): void {
    res.status(status).json(body);
}

/** Send `{ "error": <message> }`. */
export function sendError(res: Response, message: string, status = 400): void {
    res.status(status).json({ error: scrubSensitiveText(message) });
}

// ── Error Mapping ───────────────────────────────────────────────────────────

/** Map a caught error to a status code and message. */
export function mapError(err: unknown): { status: number; message: string } {
    if (err instanceof GatewayError) {
        return { status: err.status, message: scrubSensitiveText(err.message) };
    }
    if (err instanceof Error) {
        return { status: 500, message: scrubSensitiveText(err.message) };
    }
    return { status: 500, message: scrubSensitiveText(String(err)) };
}

function isBodyParseError(err: unknown): boolean {
    return isObjectRecord(err) && err.type === 'entity.parse.failed';
}

/** Client-side status carried by body-parser errors (413, 415, ...). */
function clientErrorStatus(err: unknown): number | null {
    if (!isObjectRecord(err) || typeof err.status !== 'number') {
        return null;
    }
    return err.status >= 400 && err.status < 500 ? err.status : null;
}

/** Final error middleware: malformed JSON becomes a 400, everything else goes through {@link mapError}. */
export function handleApiError(err: unknown, _req: Request, res: Response, next: NextFunction): void {
    if (res.headersSent) {
        next(err);
        return;
    }

    if (isBodyParseError(err)) {
        sendError(res, 'Invalid JSON payload', 400);
        return;
    }

    const clientStatus = clientErrorStatus(err);
    if (clientStatus !== null) {
        sendError(res, mapError(err).message, clientStatus);
        return;
    }

    const { status, message } = mapError(err);
    if (status >= 500) {
        const correlationId = res.locals.correlationId as string | undefined;
        void logThought(`[API] [${correlationId ?? 'n/a'}] Unhandled error: ${message}`);
    }
    sendError(res, message, status);
}

// ── Logging Middleware ───────────────────────────────────────────────────────

/** Log every incoming request and inject a correlation ID. */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
    const correlationId = randomUUID();
    res.locals.correlationId = correlationId;
    res.setHeader('X-Correlation-Id', correlationId);
    console.log(`[API] [${correlationId}] ${req.method} ${req.path}`);
    next();
}
