const MEMORY_MAX_SIZE = 5_000;

/**
 * Remembers recently seen `update_id`s so webhook redeliveries and polling
 * overlaps are handled once.
 */
export class UpdateDeduplicator {
  private readonly processedUpdates = new Set<number>();
  private readonly processedOrder: number[] = [];

  constructor(private readonly maxSize: number = MEMORY_MAX_SIZE) {}

  shouldProcess(updateId: number): boolean {
    if (this.processedUpdates.has(updateId)) {
      return false;
    }
    this.processedUpdates.add(updateId);
    this.processedOrder.push(updateId);
    if (this.processedOrder.length > this.maxSize) {
      const oldest = this.processedOrder.shift();
      if (typeof oldest === "number") {
        this.processedUpdates.delete(oldest);
      }
    }
    return true;
  }

  get size(): number {
    return this.processedUpdates.size;
  }
}
