/**
 * AdmissionGate bounds how many synthesis jobs execute at once.
 * Purpose: a FIFO counting semaphore whose waits can be abandoned through an AbortSignal.
 * Assumptions: all calls happen on one event loop, so the counters need no locking.
 * Usage: const permit = await gate.acquire(signal); try { ... } finally { permit.release(); }
 */

import { GateClosedError } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type Permit = {
  readonly id: number;
  readonly released: boolean;
  release(): void;
};

export type AdmissionGateStats = {
  limit: number;
  held: number;
  available: number;
  waiting: number;
};

type Waiter = {
  resolve: (permit: Permit) => void;
  reject: (reason: unknown) => void;
  detach: () => void;
};

// =============================================================================
// GATE
// =============================================================================

export class AdmissionGate {
  private readonly waiters: Waiter[] = [];
  private heldCount = 0;
  private nextPermitId = 1;
  private closedReason: GateClosedError | null = null;

  constructor(public readonly limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new Error(`Admission limit must be an integer of at least 1 (received ${limit})`);
    }
  }

  get held(): number {
    return this.heldCount;
  }

  get available(): number {
    return this.limit - this.heldCount;
  }

  get waiting(): number {
    return this.waiters.length;
  }

  stats(): AdmissionGateStats {
    return {
      limit: this.limit,
      held: this.held,
      available: this.available,
      waiting: this.waiting,
    };
  }

  acquire(signal?: AbortSignal): Promise<Permit> {
    if (this.closedReason) {
      return Promise.reject(this.closedReason);
    }
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }

    if (this.waiters.length === 0 && this.heldCount < this.limit) {
      return Promise.resolve(this.issuePermit());
    }

    return new Promise<Permit>((resolve, reject) => {
      const onAbort = () => {
        this.removeWaiter(waiter);
        reject(signal?.reason);
      };

      const waiter: Waiter = {
        resolve,
        reject,
        detach: () => signal?.removeEventListener("abort", onAbort),
      };

      signal?.addEventListener("abort", onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  close(reason?: string): void {
    if (this.closedReason) return;
    this.closedReason = new GateClosedError(reason);

    const pending = this.waiters.splice(0, this.waiters.length);
    for (const waiter of pending) {
      waiter.detach();
      waiter.reject(this.closedReason);
    }
  }

  // =============================================================================
  // INTERNALS
  // =============================================================================

  private issuePermit(): Permit {
    this.heldCount += 1;
    const id = this.nextPermitId++;
    let released = false;

    return {
      id,
      get released() {
        return released;
      },
      release: () => {
        if (released) return;
        released = true;
        this.handOff();
      },
    };
  }

  // A freed slot goes straight to the oldest waiter so later callers cannot barge ahead.
  private handOff(): void {
    this.heldCount -= 1;

    const next = this.waiters.shift();
    if (!next) return;

    next.detach();
    next.resolve(this.issuePermit());
  }

  private removeWaiter(waiter: Waiter): void {
    const index = this.waiters.indexOf(waiter);
    if (index >= 0) {
      this.waiters.splice(index, 1);
    }
    waiter.detach();
  }
}
