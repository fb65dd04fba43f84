// =============================================================================
// TYPES
// =============================================================================

export type ResourceCost = {
  processSlots: number;
  threads: number;
};

export type ResourceUsage = {
  processSlots: number;
  threads: number;
};

// =============================================================================
// BUDGET
// =============================================================================

export class ResourceBudget {
  private inUse: ResourceUsage = { processSlots: 0, threads: 0 };
  private peakUsage: ResourceUsage = { processSlots: 0, threads: 0 };

  constructor(
    public readonly maxProcessSlots: number,
    public readonly maxThreads: number,
  ) {
    if (!Number.isInteger(maxProcessSlots) || maxProcessSlots <= 0) {
      throw new Error(`maxProcessSlots must be a positive integer (received ${maxProcessSlots})`);
    }
    if (!Number.isInteger(maxThreads) || maxThreads <= 0) {
      throw new Error(`maxThreads must be a positive integer (received ${maxThreads})`);
    }
  }

  // True when the cost could run on an otherwise idle budget.
  admits(cost: ResourceCost): boolean {
    return cost.processSlots <= this.maxProcessSlots && cost.threads <= this.maxThreads;
  }

  canFit(cost: ResourceCost): boolean {
    return (
      this.inUse.processSlots + cost.processSlots <= this.maxProcessSlots &&
      this.inUse.threads + cost.threads <= this.maxThreads
    );
  }

  reserve(cost: ResourceCost): void {
    if (!this.canFit(cost)) {
      throw new Error(
        `Resource budget exceeded: ${cost.processSlots} slot(s) / ${cost.threads} thread(s) requested with ` +
          `${this.inUse.processSlots}/${this.maxProcessSlots} slots and ${this.inUse.threads}/${this.maxThreads} threads in use`,
      );
    }

    this.inUse = {
      processSlots: this.inUse.processSlots + cost.processSlots,
      threads: this.inUse.threads + cost.threads,
    };
    this.peakUsage = {
      processSlots: Math.max(this.peakUsage.processSlots, this.inUse.processSlots),
      threads: Math.max(this.peakUsage.threads, this.inUse.threads),
    };
  }

  release(cost: ResourceCost): void {
    const processSlots = this.inUse.processSlots - cost.processSlots;
    const threads = this.inUse.threads - cost.threads;
    if (processSlots < 0 || threads < 0) {
      throw new Error("Resource budget released more than was reserved");
    }
    this.inUse = { processSlots, threads };
  }

  usage(): ResourceUsage {
    return { ...this.inUse };
  }

  peak(): ResourceUsage {
    return { ...this.peakUsage };
  }
}
