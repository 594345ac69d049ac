/**
 * Case-insensitive tally of isolation sources.
 *
 * Keys are lower-cased. Insertion order is kept so ties sort in first-seen order.
 */
export class SourceHistogram {
  private readonly counts = new Map<string, number>();

  add(source: string): void {
    const key = source.toLowerCase();
    this.counts.set(key, (this.counts.get(key) ?? 0) + 1);
  }

  get(source: string): number {
    return this.counts.get(source.toLowerCase()) ?? 0;
  }

  /** Sum of all counts. */
  total(): number {
    let sum = 0;
    for (const count of this.counts.values()) sum += count;
    return sum;
  }

  /** `[source, count]` pairs by descending count; ties keep first-seen order. */
  sorted(): readonly (readonly [string, number])[] {
    return [...this.counts.entries()].sort((a, b) => b[1] - a[1]);
  }
}
