import type { ModelIdentity } from '../../src/types/dispatch.js';
import type { CpuCounterState, GpuClockReading, GpuMetricsSource, HostStatSource } from '../../src/types/telemetry.js';

export const REASONING: ModelIdentity = {
  role: 'reasoning',
  canonicalId: 'nvidia/Phi-4-reasoning-plus-FP8',
  alias: 'phi-4-reasoning-plus',
  backendEndpoint: 'http://reasoning.test:8355',
};

export const MULTIMODAL: ModelIdentity = {
  role: 'multimodal',
  canonicalId: 'nvidia/Phi-4-multimodal-instruct-NVFP4',
  alias: 'phi-4-multimodal-instruct',
  backendEndpoint: 'http://multimodal.test:8356',
};

export function completionResponse(content: string, status = 200): Response {
  return new Response(JSON.stringify({ choices: [{ message: { role: 'assistant', content } }] }), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

/** In-memory /proc and /sys tree. Files can be swapped between reads. */
export class FakeHostStats implements HostStatSource {
  readonly files = new Map<string, string>();
  readonly reads: string[] = [];
  failWith: Error | null = null;

  constructor(files: Record<string, string> = {}) {
    for (const [filePath, text] of Object.entries(files)) {
      this.files.set(filePath, text);
    }
  }

  async readText(filePath: string): Promise<string | null> {
    this.reads.push(filePath);
    if (this.failWith) {
      throw this.failWith;
    }
    return this.files.get(filePath) ?? null;
  }
}

export class FakeGpu implements GpuMetricsSource {
  constructor(
    public utilization: number[] | null = null,
    public clocks: GpuClockReading | null = null,
  ) {}

  async utilizationPercents(): Promise<number[] | null> {
    return this.utilization;
  }

  async graphicsClocks(): Promise<GpuClockReading | null> {
    return this.clocks;
  }
}

export function procStat(total: { user: number; system: number; idle: number }): string {
  return `cpu  ${total.user} 0 ${total.system} ${total.idle} 0 0 0 0 0 0\ncpu0 1 2 3 4\n`;
}

export const EMPTY_BASELINE: CpuCounterState = { prevTotal: null, prevIdle: null };
