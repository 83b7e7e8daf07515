import { compileIdKey, type CompileId } from "../contracts/compile_id";

/**
 * Per-pass side index keyed by normalized compile id. Entries are consumed
 * with `take`, which removes them.
 */
export class CompileIdIndex<T> {
  private readonly entries = new Map<string, T[]>();

  push(compileId: CompileId | null, value: T): void {
    const key = compileIdKey(compileId);
    const list = this.entries.get(key);
    if (list) {
      list.push(value);
    } else {
      this.entries.set(key, [value]);
    }
  }

  take(compileId: CompileId | null): T[] {
    const key = compileIdKey(compileId);
    const list = this.entries.get(key) ?? [];
    this.entries.delete(key);
    return list;
  }

  peek(compileId: CompileId | null): readonly T[] {
    return this.entries.get(compileIdKey(compileId)) ?? [];
  }
}

/** Latest value per compile id (no consumption). */
export class CompileIdMap<T> {
  private readonly entries = new Map<string, T>();

  set(compileId: CompileId | null, value: T): void {
    this.entries.set(compileIdKey(compileId), value);
  }

  get(compileId: CompileId | null): T | undefined {
    return this.entries.get(compileIdKey(compileId));
  }
}
