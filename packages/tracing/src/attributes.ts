/**
 * @tracewright/tracing - Attributes
 * Typed span attribute values
 */

import type { Attributes, AttributeValue as EngineAttributeValue } from "@opentelemetry/api";

// ============================================================================
// TYPES
// ============================================================================

/**
 * Attribute value, tagged with its type.
 * `int` values are always safe integers.
 */
export type AttributeValue =
  | { readonly type: "string"; readonly value: string }
  | { readonly type: "int"; readonly value: number }
  | { readonly type: "float"; readonly value: number }
  | { readonly type: "bool"; readonly value: boolean }
  | { readonly type: "string[]"; readonly value: readonly string[] }
  | { readonly type: "int[]"; readonly value: readonly number[] }
  | { readonly type: "float[]"; readonly value: readonly number[] }
  | { readonly type: "bool[]"; readonly value: readonly boolean[] };

export type AttributeType = AttributeValue["type"];

/** An immutable key/value pair attached to a span */
export interface Attribute {
  readonly key: string;
  readonly value: AttributeValue;
}

/** Scalar values accepted by {@link inferAttribute} */
export type ScalarValue = string | number | bigint | boolean;

// ============================================================================
// CONSTRUCTORS
// ============================================================================

function toInt(value: number | bigint): number {
  if (typeof value === "bigint") {
    if (value > BigInt(Number.MAX_SAFE_INTEGER)) return Number.MAX_SAFE_INTEGER;
    if (value < BigInt(Number.MIN_SAFE_INTEGER)) return Number.MIN_SAFE_INTEGER;
    return Number(value);
  }
  if (Number.isNaN(value)) return 0;
  return Math.min(Math.max(Math.trunc(value), Number.MIN_SAFE_INTEGER), Number.MAX_SAFE_INTEGER);
}

function attr(key: string, value: AttributeValue): Attribute {
  return Object.freeze({ key, value: Object.freeze(value) });
}

export function stringAttr(key: string, value: string): Attribute {
  return attr(key, { type: "string", value });
}

/** Integer attribute; fractions are truncated toward zero */
export function intAttr(key: string, value: number | bigint): Attribute {
  return attr(key, { type: "int", value: toInt(value) });
}

export function floatAttr(key: string, value: number): Attribute {
  return attr(key, { type: "float", value });
}

export function boolAttr(key: string, value: boolean): Attribute {
  return attr(key, { type: "bool", value });
}

export function stringSliceAttr(key: string, value: readonly string[]): Attribute {
  return attr(key, { type: "string[]", value: Object.freeze([...value]) });
}

export function intSliceAttr(key: string, value: readonly (number | bigint)[]): Attribute {
  return attr(key, { type: "int[]", value: Object.freeze(value.map(toInt)) });
}

export function floatSliceAttr(key: string, value: readonly number[]): Attribute {
  return attr(key, { type: "float[]", value: Object.freeze([...value]) });
}

export function boolSliceAttr(key: string, value: readonly boolean[]): Attribute {
  return attr(key, { type: "bool[]", value: Object.freeze([...value]) });
}

/**
 * Serialize a payload as a JSON string attribute.
 * Strings are assumed to already hold JSON and are stored as-is.
 */
export function jsonAttr(payload: unknown, key: string = "payload"): Attribute {
  const json = typeof payload === "string" ? payload : JSON.stringify(payload);
  return stringAttr(key, json ?? "null");
}

/**
 * Build an attribute whose type follows the runtime type of `value`.
 * Integral numbers and bigints become `int`, other numbers `float`.
 */
export function inferAttribute(key: string, value: ScalarValue): Attribute {
  if (typeof value === "string") return stringAttr(key, value);
  if (typeof value === "boolean") return boolAttr(key, value);
  if (typeof value === "bigint") return intAttr(key, value);
  return Number.isInteger(value) ? intAttr(key, value) : floatAttr(key, value);
}

// ============================================================================
// CONVERSION
// ============================================================================

/**
 * Convert attributes to the record passed to the tracing engine.
 * A repeated key keeps its last value. The record is a plain object, so integer-like
 * keys ("2", "10") come first in ascending order and the other keys follow in insertion order.
 */
export function toAttributeRecord(attrs: readonly Attribute[]): Attributes {
  const record: Attributes = {};
  for (const { key, value } of attrs) {
    record[key] = toEngineValue(value);
  }
  return record;
}

function toEngineValue(value: AttributeValue): EngineAttributeValue {
  switch (value.type) {
    case "string[]":
      return [...value.value];
    case "int[]":
    case "float[]":
      return [...value.value];
    case "bool[]":
      return [...value.value];
    default:
      return value.value;
  }
}

/** Structural equality of two attributes */
export function attributesEqual(a: Attribute, b: Attribute): boolean {
  if (a.key !== b.key || a.value.type !== b.value.type) return false;
  const left: unknown = a.value.value;
  const right: unknown = b.value.value;
  if (Array.isArray(left) && Array.isArray(right)) {
    return left.length === right.length && left.every((v, i) => Object.is(v, right[i]));
  }
  return Object.is(left, right);
}
