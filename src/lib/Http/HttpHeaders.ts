import { Option } from 'effect';

export type HeaderInit =
  | Readonly<Record<string, string | readonly string[]>>
  | Iterable<readonly [string, string]>;

/**
 * Ordered, multi-valued HTTP header map with case-insensitive names.
 *
 * Instances are immutable: every edit returns a new map. Names keep the
 * casing they were first written with; lookups ignore case.
 *
 * @example
 * ```typescript
 * const headers = HttpHeaders.from({ 'Set-Cookie': ['a=1', 'b=2'] });
 * headers.getAll('set-cookie'); // ['a=1', 'b=2']
 * headers.delete('SET-COOKIE').size; // 0
 * ```
 *
 * @group Data Types
 * @public
 */
export class HttpHeaders implements Iterable<readonly [string, string]> {
  static readonly empty = new HttpHeaders([]);

  private constructor(
    private readonly pairs: ReadonlyArray<readonly [string, string]>
  ) {}

  static from(init?: HeaderInit | HttpHeaders): HttpHeaders {
    if (init === undefined) {
      return HttpHeaders.empty;
    }
    if (init instanceof HttpHeaders) {
      return init;
    }
    if (isPairIterable(init)) {
      return new HttpHeaders(
        Array.from(init, ([name, value]) => [name, value] as const)
      );
    }
    const pairs: Array<readonly [string, string]> = [];
    for (const [name, value] of Object.entries(init)) {
      const values: readonly string[] = typeof value === 'string' ? [value] : value;
      for (const v of values) {
        pairs.push([name, v]);
      }
    }
    return new HttpHeaders(pairs);
  }

  get size(): number {
    return this.pairs.length;
  }

  /** First value stored under `name`. */
  get(name: string): Option.Option<string> {
    const key = name.toLowerCase();
    const found = this.pairs.find(([n]) => n.toLowerCase() === key);
    return found ? Option.some(found[1]) : Option.none();
  }

  getAll(name: string): string[] {
    const key = name.toLowerCase();
    return this.pairs.filter(([n]) => n.toLowerCase() === key).map(([, v]) => v);
  }

  has(name: string): boolean {
    return Option.isSome(this.get(name));
  }

  /** Replaces every value stored under `name`. */
  set(name: string, value: string): HttpHeaders {
    return new HttpHeaders([...this.delete(name).pairs, [name, value]]);
  }

  append(name: string, value: string): HttpHeaders {
    return new HttpHeaders([...this.pairs, [name, value]]);
  }

  delete(name: string): HttpHeaders {
    const key = name.toLowerCase();
    const kept = this.pairs.filter(([n]) => n.toLowerCase() !== key);
    return kept.length === this.pairs.length ? this : new HttpHeaders(kept);
  }

  entries(): Array<readonly [string, string]> {
    return [...this.pairs];
  }

  [Symbol.iterator](): Iterator<readonly [string, string]> {
    return this.pairs[Symbol.iterator]();
  }

  toRecord(): Record<string, string> {
    const record: Record<string, string> = {};
    const casing = new Map<string, string>();
    for (const [name, value] of this.pairs) {
      const key = name.toLowerCase();
      const existing = casing.get(key);
      if (existing === undefined) {
        casing.set(key, name);
        record[name] = value;
      } else {
        record[existing] = `${record[existing]}, ${value}`;
      }
    }
    return record;
  }
}

const isPairIterable = (
  init: HeaderInit
): init is Iterable<readonly [string, string]> => Symbol.iterator in init;
