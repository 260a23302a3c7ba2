import type {
  CpuCounterReading,
  GpuMetricsSource,
  HostStatSource,
  TelemetrySample,
} from '../types/telemetry.js';
import { CpuCounterStore } from './cpu-counter-store.js';
import { ProcfsHostStatSource } from './host-stat-source.js';
import { NvidiaSmiGpuMetricsSource } from './gpu-metrics-source.js';
import { logThought } from '../utils/logger.js';

export const HOST_PATHS = {
  meminfo: '/proc/meminfo',
  stat: '/proc/stat',
  cpuinfo: '/proc/cpuinfo',
  scalingCurFreq: '/sys/devices/system/cpu/cpu0/cpufreq/scaling_cur_freq',
  cpuinfoCurFreq: '/sys/devices/system/cpu/cpu0/cpufreq/cpuinfo_cur_freq',
  cpuinfoMaxFreq: '/sys/devices/system/cpu/cpu0/cpufreq/cpuinfo_max_freq',
  scalingMaxFreq: '/sys/devices/system/cpu/cpu0/cpufreq/scaling_max_freq',
} as const;

const KIB_PER_GIB = 1024 * 1024;

interface MemoryStats {
  percent: number | null;
  usedGb: number | null;
  totalGb: number | null;
}

interface ClockStats {
  currentMhz: number | null;
  maxMhz: number | null;
}

const EMPTY_MEMORY: MemoryStats = { percent: null, usedGb: null, totalGb: null };
const EMPTY_CLOCKS: ClockStats = { currentMhz: null, maxMhz: null };

export function clampPercent(value: number): number {
  return Math.max(0, Math.min(100, value));
}

function parseKilobytes(line: string): number | null {
  const value = Number.parseInt(line.split(/\s+/)[1] ?? '', 10);
  return Number.isFinite(value) ? value : null;
}

export function parseMeminfo(text: string): MemoryStats {
  let totalKb: number | null = null;
  let availableKb: number | null = null;

  for (const line of text.split('\n')) {
    if (line.startsWith('MemTotal:')) {
      totalKb = parseKilobytes(line);
    } else if (line.startsWith('MemAvailable:')) {
      availableKb = parseKilobytes(line);
    }
  }

  if (!totalKb || availableKb === null) {
    return EMPTY_MEMORY;
  }

  const usedKb = totalKb - availableKb;
  return {
    percent: clampPercent((usedKb / totalKb) * 100),
    usedGb: usedKb / KIB_PER_GIB,
    totalGb: totalKb / KIB_PER_GIB,
  };
}

/**
 * Aggregate `cpu` line of /proc/stat: user nice system idle iowait irq softirq steal.
 * Kernels that report fewer than eight counters get zeros for the missing tail.
 */
export function parseProcStat(text: string): CpuCounterReading | null {
  const parts = (text.split('\n')[0] ?? '').trim().split(/\s+/);
  if (parts.length < 5 || parts[0] !== 'cpu') {
    return null;
  }

  const counters = parts.slice(1, 9).map((raw) => Number(raw));
  if (counters.some((value) => !Number.isFinite(value))) {
    return null;
  }
  const [user = 0, nice = 0, system = 0, idle = 0, iowait = 0, irq = 0, softirq = 0, steal = 0] = counters;

  const idleAll = idle + iowait;
  const nonIdle = user + nice + system + irq + softirq + steal;
  return { total: idleAll + nonIdle, idle: idleAll };
}

function parseFrequencyKhz(text: string | null): number | null {
  if (text === null) {
    return null;
  }
  const khz = Number.parseFloat(text.trim());
  return Number.isFinite(khz) ? khz / 1000 : null;
}

export interface TelemetryCollectorOptions {
  hostStats?: HostStatSource;
  gpu?: GpuMetricsSource;
  cpuCounters?: CpuCounterStore;
  now?: () => number;
}

/**
 * Samples host utilisation. Every metric is collected on its own and fails
 * soft: an error or a missing reading nulls that metric only.
 */
export class TelemetryCollector {
  readonly #hostStats: HostStatSource;
  readonly #gpu: GpuMetricsSource;
  readonly #cpuCounters: CpuCounterStore;
  readonly #now: () => number;
  readonly #failingMetrics = new Set<string>();

  constructor(options: TelemetryCollectorOptions = {}) {
    this.#hostStats = options.hostStats ?? new ProcfsHostStatSource();
    this.#gpu = options.gpu ?? new NvidiaSmiGpuMetricsSource();
    this.#cpuCounters = options.cpuCounters ?? new CpuCounterStore();
    this.#now = options.now ?? (() => Date.now());
  }

  async sample(): Promise<TelemetrySample> {
    const [memory, gpuPercent, cpuPercent, cpuClock, gpuClock] = await Promise.all([
      this.#softly('memory', () => this.collectMemory(), EMPTY_MEMORY),
      this.#softly('gpu_percent', () => this.collectGpuPercent(), null),
      this.#softly('cpu_percent', () => this.collectCpuPercent(), null),
      this.#softly('cpu_clock', () => this.collectCpuClocks(), EMPTY_CLOCKS),
      this.#softly('gpu_clock', () => this.collectGpuClocks(), EMPTY_CLOCKS),
    ]);

    return {
      memory_percent: memory.percent,
      memory_used_gb: memory.usedGb,
      memory_total_gb: memory.totalGb,
      gpu_percent: gpuPercent,
      cpu_percent: cpuPercent,
      cpu_clock_mhz: cpuClock.currentMhz,
      cpu_clock_max_mhz: cpuClock.maxMhz,
      gpu_clock_mhz: gpuClock.currentMhz,
      gpu_clock_max_mhz: gpuClock.maxMhz,
      timestamp: Math.floor(this.#now() / 1000),
    };
  }

  async collectMemory(): Promise<MemoryStats> {
    const text = await this.#hostStats.readText(HOST_PATHS.meminfo);
    return text === null ? EMPTY_MEMORY : parseMeminfo(text);
  }

  async collectGpuPercent(): Promise<number | null> {
    const values = await this.#gpu.utilizationPercents();
    if (!values || values.length === 0) {
      return null;
    }
    return clampPercent(Math.max(...values));
  }

  /**
   * Busy share of CPU time since the previous call. The first call only seeds
   * the baseline. A non-positive total delta reports null and leaves the
   * baseline where it was.
   */
  async collectCpuPercent(): Promise<number | null> {
    return this.#cpuCounters.withLock(async (state) => {
      const text = await this.#hostStats.readText(HOST_PATHS.stat);
      const reading = text === null ? null : parseProcStat(text);
      if (!reading) {
        return { result: null };
      }

      const next = { prevTotal: reading.total, prevIdle: reading.idle };
      if (state.prevTotal === null || state.prevIdle === null) {
        return { next, result: null };
      }

      const totalDelta = reading.total - state.prevTotal;
      const idleDelta = reading.idle - state.prevIdle;
      if (totalDelta <= 0) {
        return { result: null };
      }

      return { next, result: clampPercent(((totalDelta - idleDelta) / totalDelta) * 100) };
    });
  }

  async collectCpuClocks(): Promise<ClockStats> {
    let currentMhz = await this.#averageCpuinfoMhz();

    if (currentMhz === null) {
      for (const filePath of [HOST_PATHS.scalingCurFreq, HOST_PATHS.cpuinfoCurFreq]) {
        currentMhz = parseFrequencyKhz(await this.#hostStats.readText(filePath));
        if (currentMhz !== null) {
          break;
        }
      }
    }

    let maxMhz: number | null = null;
    for (const filePath of [HOST_PATHS.cpuinfoMaxFreq, HOST_PATHS.scalingMaxFreq]) {
      maxMhz = parseFrequencyKhz(await this.#hostStats.readText(filePath));
      if (maxMhz !== null) {
        break;
      }
    }

    return { currentMhz, maxMhz: maxMhz ?? currentMhz };
  }

  async collectGpuClocks(): Promise<ClockStats> {
    const reading = await this.#gpu.graphicsClocks();
    return reading ?? EMPTY_CLOCKS;
  }

  async #averageCpuinfoMhz(): Promise<number | null> {
    const text = await this.#hostStats.readText(HOST_PATHS.cpuinfo);
    if (text === null) {
      return null;
    }

    const values = text
      .split('\n')
      .filter((line) => line.toLowerCase().startsWith('cpu mhz'))
      .map((line) => Number.parseFloat(line.slice(line.indexOf(':') + 1).trim()))
      .filter((value) => Number.isFinite(value));

    if (values.length === 0) {
      return null;
    }
    return values.reduce((sum, value) => sum + value, 0) / values.length;
  }

  async #softly<T>(metric: string, collect: () => Promise<T>, fallback: T): Promise<T> {
    try {
      const value = await collect();
      this.#failingMetrics.delete(metric);
      return value;
    } catch (error) {
      // Logged on the first failure only; cleared once the metric recovers.
      if (!this.#failingMetrics.has(metric)) {
        this.#failingMetrics.add(metric);
        const detail = error instanceof Error ? error.message : String(error);
        void logThought(`[Telemetry] ${metric} unavailable: ${detail}`);
      }
      return fallback;
    }
  }
}
