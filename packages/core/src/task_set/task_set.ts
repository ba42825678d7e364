/**
 * A set of slugs that always iterates in lexicographic order.
 *
 * Holds slugs only; entities are resolved through the runtime state's maps.
 */
export class TaskSet implements Iterable<string> {
  private readonly slugs = new Set<string>();

  constructor(slugs: Iterable<string> = []) {
    for (const slug of slugs) {
      this.slugs.add(slug);
    }
  }

  get size(): number {
    return this.slugs.size;
  }

  has(slug: string): boolean {
    return this.slugs.has(slug);
  }

  /** @returns true when the slug was not already present */
  add(slug: string): boolean {
    if (this.slugs.has(slug)) {
      return false;
    }
    this.slugs.add(slug);
    return true;
  }

  delete(slug: string): boolean {
    return this.slugs.delete(slug);
  }

  clear(): void {
    this.slugs.clear();
  }

  values(): string[] {
    return [...this.slugs].sort();
  }

  [Symbol.iterator](): Iterator<string> {
    return this.values()[Symbol.iterator]();
  }

  toJSON(): string[] {
    return this.values();
  }
}
