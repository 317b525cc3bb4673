/**
 * Member type registry
 * Canonical names, value validation and 32-byte encodings of EIP-712 member types
 */

import { bytesToHex, encodeAbiParameters, isHex, keccak256, pad, size, toHex } from 'viem';
import { SchemaDefinitionError, ValidationError } from './errors';
import type { StructSchema } from './schema';
import type { Hex } from './types';

// ═══════════════════════════════════════════════════════════════════════════
// MEMBER TYPES
// ═══════════════════════════════════════════════════════════════════════════

export type IntegerKind = 'int' | 'uint';

export type PrimitiveType =
  | { readonly kind: 'address' | 'bool' | 'string' }
  | { readonly kind: 'bytes'; readonly length?: number }
  | { readonly kind: IntegerKind; readonly bits: number };

export interface StructRefType {
  readonly kind: 'struct';
  readonly schema: StructSchema;
}

export interface ArrayType {
  readonly kind: 'array';
  readonly element: MemberType;
  /** Absent for dynamic arrays */
  readonly length?: number;
}

export type MemberType = PrimitiveType | StructRefType | ArrayType;

/** Normalized primitive value: boolean, bigint, string, or lower-case hex for bytes and addresses */
export type PrimitiveValue = boolean | bigint | string;

// ═══════════════════════════════════════════════════════════════════════════
// CONSTRUCTORS
// ═══════════════════════════════════════════════════════════════════════════

export function address(): PrimitiveType {
  return { kind: 'address' };
}

export function bool(): PrimitiveType {
  return { kind: 'bool' };
}

export function string(): PrimitiveType {
  return { kind: 'string' };
}

/**
 * `bytes1`..`bytes32`, or dynamic `bytes` when no length is given
 */
export function bytes(length?: number): PrimitiveType {
  if (length === undefined) return { kind: 'bytes' };
  if (!Number.isInteger(length) || length < 1 || length > 32) {
    throw new SchemaDefinitionError(`Byte length must be between 1 and 32, got ${length}`);
  }
  return { kind: 'bytes', length };
}

export function int(bits = 256): PrimitiveType {
  return { kind: 'int', bits: assertIntegerWidth('int', bits) };
}

export function uint(bits = 256): PrimitiveType {
  return { kind: 'uint', bits: assertIntegerWidth('uint', bits) };
}

export function struct(schema: StructSchema): StructRefType {
  return { kind: 'struct', schema };
}

/**
 * Array of `element`; fixed-length when `length` is given.
 */
export function array(element: MemberType | StructSchema, length?: number): ArrayType {
  if (length !== undefined && (!Number.isInteger(length) || length < 1)) {
    throw new SchemaDefinitionError(`Fixed array length must be a positive integer, got ${length}`);
  }
  return { kind: 'array', element: toMemberType(element), length };
}

/** A bare schema stands for a reference to that struct */
export function toMemberType(input: MemberType | StructSchema): MemberType {
  return 'kind' in input ? input : struct(input);
}

function assertIntegerWidth(kind: IntegerKind, bits: number): number {
  if (!Number.isInteger(bits) || bits < 8 || bits > 256 || bits % 8 !== 0) {
    throw new SchemaDefinitionError(
      `${kind} width must be a multiple of 8 between 8 and 256, got ${bits}`
    );
  }
  return bits;
}

// ═══════════════════════════════════════════════════════════════════════════
// TYPE NAMES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Solidity-style type name used in type signatures, e.g. `uint256`, `Person[5]`
 */
export function typeName(type: MemberType): string {
  switch (type.kind) {
    case 'address':
    case 'bool':
    case 'string':
      return type.kind;
    case 'bytes':
      return type.length === undefined ? 'bytes' : `bytes${type.length}`;
    case 'int':
    case 'uint':
      return `${type.kind}${type.bits}`;
    case 'struct':
      return type.schema.name;
    case 'array':
      return `${typeName(type.element)}[${type.length ?? ''}]`;
  }
}

export function isPrimitive(type: MemberType): type is PrimitiveType {
  return type.kind !== 'struct' && type.kind !== 'array';
}

// ═══════════════════════════════════════════════════════════════════════════
// VALIDATION
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Validate a raw value against a primitive type and return its normalized form.
 */
export function normalizePrimitive(type: PrimitiveType, value: unknown, path?: string): PrimitiveValue {
  switch (type.kind) {
    case 'address':
      return normalizeAddress(value, path);
    case 'bool':
      return normalizeBool(value, path);
    case 'string':
      return normalizeString(value, path);
    case 'bytes':
      return normalizeBytes(type.length, value, path);
    case 'int':
    case 'uint':
      return normalizeInteger(type.kind, type.bits, value, path);
  }
}

function normalizeAddress(value: unknown, path?: string): Hex {
  const hex = toHexBytes(value, path);
  if (size(hex) !== 20) {
    throw new ValidationError(`address must be 20 bytes, got ${size(hex)}`, path);
  }
  return hex;
}

function normalizeBool(value: unknown, path?: string): boolean {
  if (typeof value !== 'boolean') {
    throw new ValidationError(`expected a boolean, got ${describe(value)}`, path);
  }
  return value;
}

function normalizeString(value: unknown, path?: string): string {
  if (typeof value !== 'string') {
    throw new ValidationError(`expected a string, got ${describe(value)}`, path);
  }
  return value;
}

function normalizeBytes(length: number | undefined, value: unknown, path?: string): Hex {
  const hex = toHexBytes(value, path);
  if (length !== undefined && size(hex) > length) {
    throw new ValidationError(`bytes${length} was given ${size(hex)} bytes`, path);
  }
  return hex;
}

function normalizeInteger(kind: IntegerKind, bits: number, value: unknown, path?: string): bigint {
  const integer = toBigInt(value, path);
  const [min, max] = integerRange(kind, bits);
  if (integer < min || integer > max) {
    throw new ValidationError(`${integer} is out of range for ${kind}${bits}`, path);
  }
  return integer;
}

function integerRange(kind: IntegerKind, bits: number): [bigint, bigint] {
  if (kind === 'uint') return [0n, (1n << BigInt(bits)) - 1n];
  const half = 1n << BigInt(bits - 1);
  return [-half, half - 1n];
}

function toBigInt(value: unknown, path?: string): bigint {
  if (typeof value === 'bigint') return value;
  if (typeof value === 'number') {
    if (!Number.isSafeInteger(value)) {
      throw new ValidationError(`unsafe integer number ${value}; use a string or bigint`, path);
    }
    return BigInt(value);
  }
  if (typeof value === 'string' && /^(-?\d+|0x[0-9a-fA-F]+)$/.test(value)) {
    return BigInt(value);
  }
  throw new ValidationError(`expected an integer, got ${describe(value)}`, path);
}

function toHexBytes(value: unknown, path?: string): Hex {
  if (value instanceof Uint8Array) return bytesToHex(value);
  if (typeof value === 'string' && isHex(value, { strict: true })) {
    const digits = value.slice(2).toLowerCase();
    return `0x${digits.length % 2 ? `0${digits}` : digits}`;
  }
  throw new ValidationError(
    `expected a 0x-prefixed hex string or Uint8Array, got ${describe(value)}`,
    path
  );
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (typeof value === 'string') return `string "${value}"`;
  return typeof value;
}

// ═══════════════════════════════════════════════════════════════════════════
// ENCODING
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Encode a primitive value into its 32-byte slot
 */
export function encodePrimitive(type: PrimitiveType, value: unknown, path?: string): Hex {
  switch (type.kind) {
    case 'address':
      return encodeAbiParameters([{ type: 'address' }], [normalizeAddress(value, path)]);
    case 'bool':
      return encodeAbiParameters([{ type: 'bool' }], [normalizeBool(value, path)]);
    case 'string':
      return keccak256(toHex(normalizeString(value, path)));
    case 'bytes': {
      const hex = normalizeBytes(type.length, value, path);
      return type.length === undefined ? keccak256(hex) : pad(hex, { dir: 'right', size: 32 });
    }
    case 'int':
      // range is checked against the declared width; the slot is always 256 bits
      return encodeAbiParameters(
        [{ type: 'int256' }],
        [normalizeInteger(type.kind, type.bits, value, path)]
      );
    case 'uint':
      return encodeAbiParameters(
        [{ type: 'uint256' }],
        [normalizeInteger(type.kind, type.bits, value, path)]
      );
  }
}
