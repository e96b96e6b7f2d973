type CacheSlot<T> =
  | { valid: false; address: null; value: null }
  | { valid: true; address: number; value: T };

const EMPTY_SLOT = Object.freeze({ valid: false, address: null, value: null } as const);

/**
 * Direct-mapped read-through cache: `address` always lives in slot
 * `address % size`, so two addresses with the same residue evict each other.
 */
export class PagedCache<T> {
  private slots: CacheSlot<T>[];

  constructor(readonly size: number) {
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(`Cache size must be a positive integer, got ${size}`);
    }
    this.slots = new Array<CacheSlot<T>>(size).fill(EMPTY_SLOT);
  }

  async load(address: number, loader: (address: number) => Promise<T>): Promise<T> {
    const index = this.slotIndex(address);
    const slot = this.slots[index];
    if (slot.valid && slot.address === address) {
      return slot.value;
    }
    // a rejected loader leaves the slot as it was
    const value = await loader(address);
    this.slots[index] = { valid: true, address, value };
    return value;
  }

  invalidate(address: number): void {
    const index = this.slotIndex(address);
    const slot = this.slots[index];
    if (slot.valid && slot.address === address) {
      this.slots[index] = EMPTY_SLOT;
    }
  }

  resetAll(): void {
    this.slots.fill(EMPTY_SLOT);
  }

  private slotIndex(address: number): number {
    return address % this.size;
  }
}
