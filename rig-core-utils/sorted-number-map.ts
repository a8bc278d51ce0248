/**
 * A map keyed by numbers that keeps its entries in ascending key order. Neighbor lookups are
 * binary searches.
 */
export default class SortedNumberMap<V> {
  private readonly sortedEntries: (readonly [number, V])[] = [];

  has(key: number): boolean {
    return this.indexOf(key) !== -1;
  }

  get(key: number): V | undefined {
    const index = this.indexOf(key);
    return index === -1 ? undefined : this.sortedEntries[index]?.[1];
  }

  set(key: number, value: V): this {
    const index = this.firstIndexNotBelow(key);
    if (this.sortedEntries[index]?.[0] === key) {
      this.sortedEntries[index] = [key, value];
    } else {
      this.sortedEntries.splice(index, 0, [key, value]);
    }
    return this;
  }

  delete(key: number): boolean {
    const index = this.indexOf(key);
    if (index === -1) {
      return false;
    }
    this.sortedEntries.splice(index, 1);
    return true;
  }

  /** @returns the largest key that is strictly below `key`. */
  lowerKey(key: number): number | undefined {
    return this.keyAt(this.firstIndexNotBelow(key) - 1);
  }

  /** @returns the smallest key that is >= `key`. */
  ceilingKey(key: number): number | undefined {
    return this.keyAt(this.firstIndexNotBelow(key));
  }

  entries(): readonly (readonly [number, V])[] {
    return [...this.sortedEntries];
  }

  private keyAt(index: number): number | undefined {
    if (index < 0 || index >= this.sortedEntries.length) {
      return undefined;
    }
    return this.sortedEntries[index]?.[0];
  }

  private indexOf(key: number): number {
    const index = this.firstIndexNotBelow(key);
    return this.sortedEntries[index]?.[0] === key ? index : -1;
  }

  private firstIndexNotBelow(key: number): number {
    return this.partitionPoint((entryKey) => entryKey < key);
  }

  private partitionPoint(isBefore: (entryKey: number) => boolean): number {
    let low = 0;
    let high = this.sortedEntries.length;
    while (low < high) {
      const middle = (low + high) >>> 1;
      const entry = this.sortedEntries[middle];
      if (entry != null && isBefore(entry[0])) {
        low = middle + 1;
      } else {
        high = middle;
      }
    }
    return low;
  }
}
