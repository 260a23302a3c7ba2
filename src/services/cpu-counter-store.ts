import type { CpuCounterState } from '../types/telemetry.js';

export interface CpuCounterUpdate<T> {
  /** Replacement baseline; omit to leave the stored one untouched. */
  next?: CpuCounterState;
  result: T;
}

/**
 * Owns the CPU jiffy baseline shared by every telemetry request.
 *
 * Read-modify-write cycles run one at a time through a promise chain, so each
 * cycle sees the baseline stored by the cycle before it.
 */
export class CpuCounterStore {
  #state: CpuCounterState = { prevTotal: null, prevIdle: null };
  #tail: Promise<void> = Promise.resolve();

  snapshot(): CpuCounterState {
    return { ...this.#state };
  }

  withLock<T>(task: (state: Readonly<CpuCounterState>) => Promise<CpuCounterUpdate<T>>): Promise<T> {
    const run = this.#tail.then(async () => {
      const { next, result } = await task({ ...this.#state });
      if (next) {
        this.#state = { ...next };
      }
      return result;
    });
    // The caller receives the rejection through `run`; the chain itself keeps going.
    this.#tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
