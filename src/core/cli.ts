import type { GatewayConfig } from '../config/config-loader.js';
import { HealthReportService, parseHealthReportMode } from './health-report.js';

// ── Help text ────────────────────────────────────────────────────────────────

const HELP_TEXT = `
Usage: dispatch-gateway [command] [options]

Commands:
  (none)                          Start the gateway HTTP server
  health-report [full|compact]    Probe both backends and the running gateway, print a JSON report

Options:
  --help, -h, help                Show this help message

Environment:
  PUBLIC_PORT, REASONING_URL, MULTIMODAL_URL, MODEL_REASONING_ID, MODEL_MULTIMODAL_ID,
  MODEL_REASONING_ALIAS, MODEL_MULTIMODAL_ALIAS, GATEWAY_STATIC_DIR, GATEWAY_LOG_DIR

Examples:
  dispatch-gateway
  dispatch-gateway health-report
  dispatch-gateway health-report compact
`.trim();

// ── Command handlers ─────────────────────────────────────────────────────────

const HELP_FLAGS = new Set(['--help', '-h', 'help']);

/** Print usage for `--help`, `-h` or a bare `help` command. */
export function handleHelpCli(argv: string[]): boolean {
  if (!argv.some((arg) => HELP_FLAGS.has(arg))) return false;

  console.log(HELP_TEXT);
  process.exitCode = 0;
  return true;
}

/**
 * Handle the `health-report` command.
 * Prints the JSON report and sets exit code 1 when any check failed.
 * Returns `true` when the command was recognized and handled.
 */
export async function handleHealthReportCli(argv: string[], config: Readonly<GatewayConfig>): Promise<boolean> {
  if (argv[0] !== 'health-report') return false;

  const mode = parseHealthReportMode(argv[1]);
  if (mode === null) {
    console.log(JSON.stringify({ ok: false, error: 'Usage: health-report [full|compact|?compact]' }));
    process.exitCode = 1;
    return true;
  }

  const report = await new HealthReportService(config, { mode }).run();
  console.log(JSON.stringify(report, null, 2));
  process.exitCode = report.ok ? 0 : 1;
  return true;
}

/**
 * Guard against unknown or mistyped top-level commands.
 * Returns `true` and sets a non-zero exit code when an unknown command is detected.
 */
export function handleUnknownCommand(argv: string[]): boolean {
  if (argv.length === 0) return false;

  const command = argv[0] ?? '';
  if (command === 'health-report' || HELP_FLAGS.has(command)) {
    return false;
  }

  console.error(`[Gateway] Unknown command: '${command}'`);
  console.error(`Run 'dispatch-gateway --help' to see available commands.`);
  process.exitCode = 1;
  return true;
}
