import { err, ok, type Result } from "../result";
import {
  type FlagKind,
  type IntegerKind,
  integerBounds,
  type TypedValue,
} from "./kinds";

export type CoercionFailureReason =
  | "not-a-number"
  | "out-of-range"
  | "not-a-boolean";

export type CoercionFailure = {
  kind: FlagKind;
  text: string;
  reason: CoercionFailureReason;
};

const unsignedIntegerRegex = /^\+?[0-9]+$/;
const signedIntegerRegex = /^[+-]?[0-9]+$/;
const floatRegex = /^[+-]?(?:[0-9]+\.?[0-9]*|\.[0-9]+)(?:[eE][+-]?[0-9]+)?$/;

export function parseToken(
  kind: FlagKind,
  text: string
): Result<TypedValue, CoercionFailure> {
  switch (kind) {
    case "u8":
    case "u16":
    case "u32":
    case "i8":
    case "i16":
    case "i32": {
      const parsed = parseInteger(kind, text);
      if (!parsed.ok) {
        return parsed;
      }
      return ok({ kind, value: Number(parsed.value) });
    }
    case "u64":
    case "i64": {
      const parsed = parseInteger(kind, text);
      if (!parsed.ok) {
        return parsed;
      }
      return ok({ kind, value: parsed.value });
    }
    case "f64": {
      if (!floatRegex.test(text)) {
        return err({ kind, text, reason: "not-a-number" });
      }
      const value = Number(text);
      if (!Number.isFinite(value)) {
        return err({ kind, text, reason: "out-of-range" });
      }
      return ok({ kind, value });
    }
    case "bool":
    case "switch": {
      if (text === "true") {
        return ok({ kind, value: true });
      }
      if (text === "false") {
        return ok({ kind, value: false });
      }
      return err({ kind, text, reason: "not-a-boolean" });
    }
    case "string":
      return ok({ kind, value: text });
    default:
      return unreachableKind(kind);
  }
}

export function formatValue(typed: TypedValue): string {
  switch (typed.kind) {
    case "string":
      return typed.value;
    case "bool":
    case "switch":
      return typed.value ? "true" : "false";
    default:
      return String(typed.value);
  }
}

/**
 * Checks that a JavaScript value fits `kind` and wraps it.
 * Returns null when it does not, e.g. `300` for `u8` or `NaN` for `f64`.
 */
export function toTypedValue(kind: FlagKind, raw: unknown): TypedValue | null {
  switch (kind) {
    case "u8":
    case "u16":
    case "u32":
    case "i8":
    case "i16":
    case "i32":
      return typeof raw === "number" &&
        Number.isInteger(raw) &&
        fitsInteger(kind, BigInt(raw))
        ? { kind, value: raw }
        : null;
    case "u64":
    case "i64":
      return typeof raw === "bigint" && fitsInteger(kind, raw)
        ? { kind, value: raw }
        : null;
    case "f64":
      return typeof raw === "number" && Number.isFinite(raw)
        ? { kind, value: raw }
        : null;
    case "bool":
    case "switch":
      return typeof raw === "boolean" ? { kind, value: raw } : null;
    case "string":
      return typeof raw === "string" ? { kind, value: raw } : null;
    default:
      return unreachableKind(kind);
  }
}

function parseInteger(
  kind: IntegerKind,
  text: string
): Result<bigint, CoercionFailure> {
  const pattern =
    integerBounds[kind].min === 0n ? unsignedIntegerRegex : signedIntegerRegex;
  if (!pattern.test(text)) {
    return err({ kind, text, reason: "not-a-number" });
  }

  const value = BigInt(text);
  if (!fitsInteger(kind, value)) {
    return err({ kind, text, reason: "out-of-range" });
  }
  return ok(value);
}

function fitsInteger(kind: IntegerKind, value: bigint): boolean {
  const { min, max } = integerBounds[kind];
  return value >= min && value <= max;
}

function unreachableKind(kind: never): never {
  throw new Error(`Unsupported flag kind: ${String(kind)}`);
}
