import { comparisonKey, type Tag } from './tag';

/**
 * Insertion-ordered set of tags, unique under the comparison policy.
 * When two spellings compare equal, the first one added is the one kept.
 */
export class TagSet implements Iterable<Tag> {
  private readonly items = new Map<string, Tag>();
  readonly caseSensitive: boolean;

  constructor(caseSensitive: boolean, tags: Iterable<Tag> = []) {
    this.caseSensitive = caseSensitive;
    for (const tag of tags) {
      this.add(tag);
    }
  }

  get size(): number {
    return this.items.size;
  }

  has(tag: string): boolean {
    return this.items.has(this.keyOf(tag));
  }

  /** Returns false when an equal tag was already present. */
  add(tag: Tag): boolean {
    const key = this.keyOf(tag);
    if (this.items.has(key)) {
      return false;
    }
    this.items.set(key, tag);
    return true;
  }

  delete(tag: string): boolean {
    return this.items.delete(this.keyOf(tag));
  }

  /** Stored spelling of a tag equal to `tag`, if any. */
  get(tag: string): Tag | undefined {
    return this.items.get(this.keyOf(tag));
  }

  values(): Tag[] {
    return [...this.items.values()];
  }

  keys(): Set<string> {
    return new Set(this.items.keys());
  }

  [Symbol.iterator](): Iterator<Tag> {
    return this.items.values();
  }

  clone(): TagSet {
    return new TagSet(this.caseSensitive, this.items.values());
  }

  /**
   * Order-independent identity of the set's contents.
   */
  equalityKey(): string {
    return JSON.stringify([...this.items.keys()].sort());
  }

  private keyOf(tag: string): string {
    return comparisonKey(tag, this.caseSensitive);
  }
}
