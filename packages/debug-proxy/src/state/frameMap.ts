/**
 * Filtered stack index -> original backend index, rebuilt after each
 * stack-trace filtering pass.
 */
export class FrameMap {
  private mapping = new Map<number, number>();

  /** Identity over `[0, count)`, the shape a suffix-only filter produces. */
  public replaceWithIdentity(count: number): void {
    const next = new Map<number, number>();
    for (let i = 0; i < count; i++) {
      next.set(i, i);
    }
    this.mapping = next;
  }

  public replace(entries: Iterable<[number, number]>): void {
    this.mapping = new Map(entries);
  }

  public translate(index: number): number | undefined {
    return this.mapping.get(index);
  }

  public entries(): Array<[number, number]> {
    return Array.from(this.mapping.entries());
  }

  public get size(): number {
    return this.mapping.size;
  }

  public clear(): void {
    this.mapping = new Map();
  }
}
