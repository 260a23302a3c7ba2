import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import type { GpuClockReading, GpuMetricsSource } from '../types/telemetry.js';

const execFileAsync = promisify(execFile);

export const GPU_QUERY_TIMEOUT_MS = 2_000;
const NVIDIA_SMI = 'nvidia-smi';

export type GpuQueryRunner = (args: readonly string[], timeoutMs: number) => Promise<string>;

async function runNvidiaSmi(args: readonly string[], timeoutMs: number): Promise<string> {
  const { stdout } = await execFileAsync(NVIDIA_SMI, [...args], {
    timeout: timeoutMs,
    encoding: 'utf8',
    windowsHide: true,
  });
  return stdout;
}

function nonEmptyLines(output: string): string[] {
  return output
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean);
}

function parseNumber(raw: string | undefined): number | null {
  if (raw === undefined) {
    return null;
  }
  const value = Number.parseFloat(raw.trim());
  return Number.isFinite(value) ? value : null;
}

/**
 * GPU metrics read through `nvidia-smi` in CSV mode. Every query is a bounded
 * subprocess call; a missing binary or a non-zero exit rejects and the
 * collector degrades that field to null.
 */
export class NvidiaSmiGpuMetricsSource implements GpuMetricsSource {
  readonly #run: GpuQueryRunner;
  readonly #timeoutMs: number;

  constructor(run: GpuQueryRunner = runNvidiaSmi, timeoutMs = GPU_QUERY_TIMEOUT_MS) {
    this.#run = run;
    this.#timeoutMs = timeoutMs;
  }

  async utilizationPercents(): Promise<number[] | null> {
    const output = await this.#run(
      ['--query-gpu=utilization.gpu', '--format=csv,noheader,nounits'],
      this.#timeoutMs,
    );
    const values = nonEmptyLines(output).map((line) => parseNumber(line));
    if (values.length === 0 || values.some((value) => value === null)) {
      return null;
    }
    return values.filter((value): value is number => value !== null);
  }

  async graphicsClocks(): Promise<GpuClockReading | null> {
    const output = await this.#run(
      ['--query-gpu=clocks.current.graphics,clocks.max.graphics', '--format=csv,noheader,nounits'],
      this.#timeoutMs,
    );
    const [first] = nonEmptyLines(output);
    if (!first) {
      return null;
    }
    const fields = first.split(',');
    if (fields.length < 2) {
      return null;
    }
    const currentMhz = parseNumber(fields[0]);
    const maxMhz = parseNumber(fields[1]);
    if (currentMhz === null || maxMhz === null) {
      return null;
    }
    return { currentMhz, maxMhz };
  }
}
