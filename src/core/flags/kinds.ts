export const integerKinds = [
  "u8",
  "u16",
  "u32",
  "u64",
  "i8",
  "i16",
  "i32",
  "i64",
] as const;
export type IntegerKind = (typeof integerKinds)[number];

export const flagKinds = [
  ...integerKinds,
  "f64",
  "bool",
  "switch",
  "string",
] as const;
export type FlagKind = (typeof flagKinds)[number];

type FlagValueMap = {
  u8: number;
  u16: number;
  u32: number;
  u64: bigint;
  i8: number;
  i16: number;
  i32: number;
  i64: bigint;
  f64: number;
  bool: boolean;
  switch: boolean;
  string: string;
};

export type FlagValueOf<K extends FlagKind> = FlagValueMap[K];

export type TypedValueOf<K extends FlagKind> = {
  kind: K;
  value: FlagValueOf<K>;
};

export type TypedValue = { [K in FlagKind]: TypedValueOf<K> }[FlagKind];

type IntegerBounds = { min: bigint; max: bigint };

export const integerBounds: Record<IntegerKind, IntegerBounds> = {
  u8: { min: 0n, max: 255n },
  u16: { min: 0n, max: 65_535n },
  u32: { min: 0n, max: 4_294_967_295n },
  u64: { min: 0n, max: 18_446_744_073_709_551_615n },
  i8: { min: -128n, max: 127n },
  i16: { min: -32_768n, max: 32_767n },
  i32: { min: -2_147_483_648n, max: 2_147_483_647n },
  i64: {
    min: -9_223_372_036_854_775_808n,
    max: 9_223_372_036_854_775_807n,
  },
};

export function isFlagKind(value: string): value is FlagKind {
  return flagKinds.some((kind) => kind === value);
}

export function hasKind<K extends FlagKind>(
  typed: { kind: FlagKind; value: unknown },
  kind: K
): typed is TypedValueOf<K> {
  return typed.kind === kind;
}
