export interface TelemetrySample {
  memory_percent: number | null;
  memory_used_gb: number | null;
  memory_total_gb: number | null;
  gpu_percent: number | null;
  cpu_percent: number | null;
  cpu_clock_mhz: number | null;
  cpu_clock_max_mhz: number | null;
  gpu_clock_mhz: number | null;
  gpu_clock_max_mhz: number | null;
  /** Unix seconds. */
  timestamp: number;
}

export interface TelemetrySnapshotBody extends TelemetrySample {
  ok: true;
  source: 'local_system';
  auth_mode: 'local_only';
  ts: number;
}

export interface CpuCounterState {
  prevTotal: number | null;
  prevIdle: number | null;
}

export interface CpuCounterReading {
  total: number;
  idle: number;
}

export interface GpuClockReading {
  currentMhz: number | null;
  maxMhz: number | null;
}

/** Reads host interfaces such as /proc/meminfo. Resolves null when a file is absent. */
export interface HostStatSource {
  readText(filePath: string): Promise<string | null>;
}

/** GPU management capability; each call resolves null when no reading is possible. */
export interface GpuMetricsSource {
  utilizationPercents(): Promise<number[] | null>;
  graphicsClocks(): Promise<GpuClockReading | null>;
}
