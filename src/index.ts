#!/usr/bin/env node
import 'dotenv/config';
import { loadGatewayConfig } from './config/config-loader.js';
import { validateRuntimeConfig } from './config/env-validator.js';
import { handleHealthReportCli, handleHelpCli, handleUnknownCommand } from './core/cli.js';
import { startApiServer } from './api/router.js';
import { BackendResolver } from './services/backend-resolver.js';
import { RouteClassifier } from './services/route-classifier.js';
import { DispatchForwarder } from './services/dispatch-forwarder.js';
import { TelemetryCollector } from './services/telemetry-collector.js';
import { CpuCounterStore } from './services/cpu-counter-store.js';
import { logThought } from './utils/logger.js';

const argv = process.argv.slice(2);

// ── Early one-shot CLI commands (bypass server startup) ──────────────────────

if (handleHelpCli(argv) || handleUnknownCommand(argv)) {
    process.exit(process.exitCode ?? 0);
}

const validation = validateRuntimeConfig();
if (!validation.ok) {
    for (const issue of validation.issues) {
        console.error(`[Gateway] ${issue.message} ${issue.remediation}`);
    }
    console.error('[Gateway] Startup blocked by invalid configuration.');
    process.exit(1);
}

const config = loadGatewayConfig();
process.env.GATEWAY_LOG_DIR = config.logDir;

if (await handleHealthReportCli(argv, config)) {
    process.exit(process.exitCode ?? 0);
}

// ── Dispatch engine ──────────────────────────────────────────────────────────

const resolver = new BackendResolver(config.reasoning, config.multimodal);
const classifier = new RouteClassifier(resolver.reasoning, resolver.multimodal);
const forwarder = new DispatchForwarder(resolver);
const telemetry = new TelemetryCollector({ cpuCounters: new CpuCounterStore() });

void logThought(
    `[Gateway] Starting with reasoning=${config.reasoning.canonicalId}@${config.reasoning.backendEndpoint}, ` +
        `multimodal=${config.multimodal.canonicalId}@${config.multimodal.backendEndpoint}.`,
);

const server = startApiServer({ config, resolver, classifier, forwarder, telemetry });

// ── Graceful shutdown ────────────────────────────────────────────────────────

const shutdown = (signal: string): void => {
    console.log(`[Gateway] Received ${signal}, closing server.`);
    server.close(() => process.exit(0));
};

process.once('SIGINT', () => shutdown('SIGINT'));
process.once('SIGTERM', () => shutdown('SIGTERM'));
