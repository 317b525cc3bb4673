/**
 * Value encoder
 * Struct instances and the encodeData / hashStruct steps of EIP-712
 */

import { concatHex, keccak256 } from 'viem';
import { ValidationError } from './errors';
import {
  encodePrimitive,
  isPrimitive,
  normalizePrimitive,
  type ArrayType,
  type MemberType,
} from './memberTypes';
import { encodeType, typeHash } from './resolver';
import type { StructSchema } from './schema';
import type { Hex, MessageData, MessageValue, StructValues } from './types';

/**
 * Member value after validation: integers are bigint, bytes and addresses
 * lower-case hex, nested structs StructInstance.
 */
export type NormalizedValue =
  | boolean
  | bigint
  | string
  | StructInstance
  | readonly NormalizedValue[];

// ═══════════════════════════════════════════════════════════════════════════
// STRUCT INSTANCE
// ═══════════════════════════════════════════════════════════════════════════

export class StructInstance {
  readonly schema: StructSchema;
  private readonly values = new Map<string, NormalizedValue>();

  /**
   * @param path - prefix for validation error paths, defaults to the struct name
   */
  constructor(schema: StructSchema, values: StructValues = {}, path = schema.name) {
    this.schema = schema;
    for (const [name, value] of Object.entries(values)) {
      if (value === undefined) continue;
      this.assign(name, value, `${path}.${name}`);
    }
  }

  get(name: string): NormalizedValue | undefined {
    this.memberType(name, `${this.schema.name}.${name}`);
    return this.values.get(name);
  }

  set(name: string, value: unknown): void {
    this.assign(name, value, `${this.schema.name}.${name}`);
  }

  has(name: string): boolean {
    return this.values.has(name);
  }

  /**
   * Plain nested data, nested structs included
   */
  toData(): MessageData {
    const data: MessageData = {};
    for (const { name } of this.schema.members) {
      const value = this.values.get(name);
      if (value !== undefined) data[name] = toMessageValue(value);
    }
    return data;
  }

  encodeValue(): Hex {
    return encodeValue(this);
  }

  hashStruct(): Hex {
    return hashStruct(this);
  }

  /**
   * Same type signature and same encoded values
   */
  equals(other: StructInstance): boolean {
    if (other === this) return true;
    return (
      encodeType(this.schema) === encodeType(other.schema) &&
      encodeValue(this) === encodeValue(other)
    );
  }

  private assign(name: string, value: unknown, path: string): void {
    const type = this.memberType(name, path);
    this.values.set(name, normalizeValue(type, value, path));
  }

  private memberType(name: string, path: string): MemberType {
    const type = this.schema.getMember(name);
    if (!type) {
      throw new ValidationError(`"${name}" is not a member of ${this.schema.name}`, path);
    }
    return type;
  }
}

function toMessageValue(value: NormalizedValue): MessageValue {
  if (typeof value !== 'object') return value;
  if (value instanceof StructInstance) return value.toData();
  return value.map(toMessageValue);
}

// ═══════════════════════════════════════════════════════════════════════════
// NORMALIZATION
// ═══════════════════════════════════════════════════════════════════════════

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Uint8Array)
  );
}

/**
 * Validate a raw value against any member type and return its normalized form.
 * Plain objects given for struct members become instances of the referenced schema.
 */
export function normalizeValue(type: MemberType, value: unknown, path: string): NormalizedValue {
  if (type.kind === 'struct') return normalizeStruct(type.schema, value, path);
  if (type.kind === 'array') return normalizeArray(type, value, path);
  return normalizePrimitive(type, value, path);
}

function normalizeStruct(schema: StructSchema, value: unknown, path: string): StructInstance {
  if (value instanceof StructInstance) {
    if (value.schema === schema) return value;
    if (value.schema.name !== schema.name) {
      throw new ValidationError(
        `expected a ${schema.name} instance, got ${value.schema.name}`,
        path
      );
    }
    // same name is not enough: nested structs must match too
    const expected = encodeType(schema);
    const actual = encodeType(value.schema);
    if (expected !== actual) {
      throw new ValidationError(`expected ${expected}, got ${actual}`, path);
    }
    return value;
  }
  if (isPlainObject(value)) {
    return new StructInstance(schema, value, path);
  }
  throw new ValidationError(`expected ${schema.name} values, got ${typeof value}`, path);
}

function normalizeArray(type: ArrayType, value: unknown, path: string): NormalizedValue[] {
  if (!Array.isArray(value)) {
    throw new ValidationError(`expected an array, got ${typeof value}`, path);
  }
  if (type.length !== undefined && value.length !== type.length) {
    throw new ValidationError(
      `expected ${type.length} elements, got ${value.length}`,
      path
    );
  }
  return value.map((element: unknown, index) =>
    normalizeValue(type.element, element, `${path}[${index}]`)
  );
}

// ═══════════════════════════════════════════════════════════════════════════
// ENCODING
// ═══════════════════════════════════════════════════════════════════════════

/**
 * 32-byte encoding of one member value
 */
export function encodeMember(type: MemberType, value: unknown, path: string): Hex {
  if (isPrimitive(type)) return encodePrimitive(type, value, path);
  if (type.kind === 'struct') return normalizeStruct(type.schema, value, path).hashStruct();

  const elements = normalizeArray(type, value, path).map((element, index) =>
    encodeMember(type.element, element, `${path}[${index}]`)
  );
  return keccak256(concatHex(elements));
}

/**
 * encodeData: each member's 32-byte encoding in declaration order
 */
export function encodeValue(instance: StructInstance): Hex {
  const { schema } = instance;
  // resolves (and seals) the whole graph before any value is read
  encodeType(schema);

  const encoded = schema.members.map(({ name, type }) => {
    const value = instance.get(name);
    if (value === undefined) {
      throw new ValidationError('missing value', `${schema.name}.${name}`);
    }
    return encodeMember(type, value, `${schema.name}.${name}`);
  });
  return concatHex(encoded);
}

/**
 * hashStruct = keccak256(typeHash || encodeData)
 */
export function hashStruct(instance: StructInstance): Hex {
  return keccak256(concatHex([typeHash(instance.schema), encodeValue(instance)]));
}
