export const UNKNOWN_INTERNED_STRING = "(unknown)";

/**
 * Append-only id → string table fed by `str` side-channel records. One table
 * per interpreter pass.
 */
export class InternTable {
  private readonly entries = new Map<number, string>();

  insert(id: number, value: string): void {
    this.entries.set(id, value);
  }

  resolve(id: number): string {
    return this.entries.get(id) ?? UNKNOWN_INTERNED_STRING;
  }

  get size(): number {
    return this.entries.size;
  }

  /** Dense array sized max id + 1, unused slots null; `[null]` when nothing was interned. */
  toStringTable(): Array<string | null> {
    let maxId = 0;
    for (const id of this.entries.keys()) {
      if (id > maxId) maxId = id;
    }
    const table: Array<string | null> = new Array<string | null>(maxId + 1).fill(null);
    for (const [id, value] of this.entries) {
      table[id] = value;
    }
    return table;
  }
}
