import type { RetrievalError } from "../errors";
import {
  type FlagKind,
  type FlagValueOf,
  hasKind,
  type TypedValue,
} from "../flags/kinds";
import { err, ok, type Result } from "../result";

export type FlagValueEntry = readonly [name: string, typed: TypedValue];

export type FlagValues = {
  /** Number of stored values; equals the number of registered flags. */
  readonly size: number;
  has(name: string): boolean;
  get<K extends FlagKind>(
    name: string,
    kind: K
  ): Result<FlagValueOf<K>, RetrievalError>;
  entries(): FlagValueEntry[];
};

export function createFlagValues(
  values: readonly FlagValueEntry[]
): FlagValues {
  const store = new Map<string, TypedValue>();
  for (const [name, typed] of values) {
    store.set(name, Object.freeze({ ...typed }));
  }

  function has(name: string): boolean {
    return store.has(name);
  }

  function get<K extends FlagKind>(
    name: string,
    kind: K
  ): Result<FlagValueOf<K>, RetrievalError> {
    const stored = store.get(name);
    if (stored === undefined) {
      return err({ code: "unknown-flag-name", name });
    }
    if (!hasKind(stored, kind)) {
      return err({
        code: "type-mismatch",
        name,
        expected: kind,
        actual: stored.kind,
      });
    }
    return ok(stored.value);
  }

  function entries(): FlagValueEntry[] {
    return Array.from(store.entries());
  }

  return Object.freeze({
    size: store.size,
    has,
    get,
    entries,
  });
}
