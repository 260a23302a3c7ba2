import type { Request, Response } from 'express';
import type { TelemetryCollector } from '../../services/telemetry-collector.js';
import type { TelemetrySnapshotBody } from '../../types/telemetry.js';
import { sendJson } from '../shared.js';

export interface TelemetryDeps {
    collector: TelemetryCollector;
}

/** GET /telemetry/snapshot — one host sample; unavailable metrics are null. */
export function handleTelemetrySnapshot(deps: TelemetryDeps) {
    return async (_req: Request, res: Response): Promise<void> => {
        const sample = await deps.collector.sample();
        const body: TelemetrySnapshotBody = {
            ok: true,
            source: 'local_system',
            ...sample,
            auth_mode: 'local_only',
            ts: sample.timestamp,
        };
        sendJson(res, body);
    };
}
