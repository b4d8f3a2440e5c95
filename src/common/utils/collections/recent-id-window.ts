/**
 * Fixed-capacity window of recently seen identifiers.
 *
 * A circular buffer keeps insertion order and a companion set answers
 * membership. When the buffer is full the oldest identifier is overwritten,
 * so eviction is O(1) and the window never holds more than `capacity` ids.
 */
export class RecentIdWindow<TId extends string | number> {
  private readonly slots: (TId | undefined)[];
  private readonly members: Set<TId> = new Set<TId>();
  private nextSlot: number = 0;
  private evictedCount: number = 0;

  public constructor(private readonly capacity: number) {
    if (!Number.isSafeInteger(capacity) || capacity <= 0) {
      throw new Error(`RecentIdWindow capacity must be a positive integer, got ${String(capacity)}`);
    }

    this.slots = new Array<TId | undefined>(capacity).fill(undefined);
  }

  public has(id: TId): boolean {
    return this.members.has(id);
  }

  /**
   * Returns `true` when the id was new and has been recorded,
   * `false` when it was already inside the window.
   */
  public add(id: TId): boolean {
    if (this.members.has(id)) {
      return false;
    }

    const evictedId: TId | undefined = this.slots[this.nextSlot];

    if (evictedId !== undefined) {
      this.members.delete(evictedId);
      this.evictedCount += 1;
    }

    this.slots[this.nextSlot] = id;
    this.members.add(id);
    this.nextSlot = (this.nextSlot + 1) % this.capacity;
    return true;
  }

  public get size(): number {
    return this.members.size;
  }

  public get evicted(): number {
    return this.evictedCount;
  }

  public clear(): void {
    this.slots.fill(undefined);
    this.members.clear();
    this.nextSlot = 0;
  }
}
