/**
 * Runtime configuration validator.
 *
 * Produces structured diagnostics for:
 *   - Format violations (port range, absolute http(s) URLs).
 *   - Model names that collide across the two backends, which would make
 *     resolution ambiguous.
 */

import { CONFIG_SCHEMA, CONFIG_SCHEMA_MAP } from './env-schema.js';
import type { ConfigKeySpec, GatewayConfigKey } from './env-schema.js';
import { getConfigValue, type EnvSource } from './config-loader.js';

// ── Public types ──────────────────────────────────────────────────────────────

export type ConfigIssueClass = 'format_error' | 'duplicate_model_name';

export interface ConfigIssue {
  /** Affected config key. */
  key: GatewayConfigKey;
  /** Semantic category for automation. */
  class: ConfigIssueClass;
  /** Human-readable description of the problem. */
  message: string;
  /** Actionable remediation hint. */
  remediation: string;
}

export interface ConfigValidationResult {
  /** true when the gateway can start with this configuration. */
  ok: boolean;
  /** Keys explicitly set in the environment (the rest use defaults). */
  overriddenKeys: GatewayConfigKey[];
  issues: ConfigIssue[];
  /** ISO-8601 timestamp of validation run. */
  validatedAt: string;
}

// ── Internal helpers ─────────────────────────────────────────────────────────

const MODEL_NAME_KEYS: readonly GatewayConfigKey[] = [
  'MODEL_REASONING_ID',
  'MODEL_REASONING_ALIAS',
  'MODEL_MULTIMODAL_ID',
  'MODEL_MULTIMODAL_ALIAS',
];

function isOverridden(spec: ConfigKeySpec, env: EnvSource): boolean {
  const raw = env[spec.key];
  return typeof raw === 'string' && raw.trim().length > 0;
}

/** Returns an issue message if the resolved value is invalid, null if ok. */
function formatError(spec: ConfigKeySpec, value: string): string | null {
  switch (spec.kind) {
    case 'port': {
      const parsed = Number(value);
      if (!Number.isInteger(parsed) || parsed < 1 || parsed > 65535) {
        return `${spec.key} must be an integer in range 1–65535, got '${value}'.`;
      }
      return null;
    }
    case 'url': {
      let parsed: URL;
      try {
        parsed = new URL(value);
      } catch {
        return `${spec.key} must be an absolute URL, got '${value}'.`;
      }
      if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
        return `${spec.key} must use http or https, got '${parsed.protocol}'.`;
      }
      return null;
    }
    case 'string':
    case 'path':
      return null;
  }
}

function findDuplicateModelNames(env: EnvSource): ConfigIssue[] {
  const seen = new Map<string, GatewayConfigKey>();
  const issues: ConfigIssue[] = [];

  for (const key of MODEL_NAME_KEYS) {
    const value = getConfigValue(key, env);
    const previous = seen.get(value);
    if (previous) {
      issues.push({
        key,
        class: 'duplicate_model_name',
        message: `${key} ('${value}') collides with ${previous}; model names must be unique.`,
        remediation: CONFIG_SCHEMA_MAP.get(key)?.remediation ?? `Give ${key} a distinct value.`,
      });
      continue;
    }
    seen.set(value, key);
  }

  return issues;
}

// ── Public API ───────────────────────────────────────────────────────────────

/**
 * Validate the gateway configuration against the schema.
 *
 * @param now - Injectable clock. Defaults to `new Date()`.
 */
export function validateRuntimeConfig(
  env: EnvSource = process.env,
  now: () => Date = () => new Date(),
): ConfigValidationResult {
  const issues: ConfigIssue[] = [];
  const overriddenKeys: GatewayConfigKey[] = [];

  for (const spec of CONFIG_SCHEMA) {
    if (isOverridden(spec, env)) {
      overriddenKeys.push(spec.key);
    }

    const formatErr = formatError(spec, getConfigValue(spec.key, env));
    if (formatErr) {
      issues.push({
        key: spec.key,
        class: 'format_error',
        message: formatErr,
        remediation: spec.remediation,
      });
    }
  }

  issues.push(...findDuplicateModelNames(env));

  return {
    ok: issues.length === 0,
    overriddenKeys: overriddenKeys.sort(),
    issues,
    validatedAt: now().toISOString(),
  };
}
