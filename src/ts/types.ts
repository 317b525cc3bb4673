/**
 * Typed structured data type definitions
 * Wire shapes for EIP-712 messages and the values held by struct instances
 */

// ═══════════════════════════════════════════════════════════════════════════
// HELPER TYPES
// ═══════════════════════════════════════════════════════════════════════════

export type Hex = `0x${string}`;
export type Address = `0x${string}`;

// ═══════════════════════════════════════════════════════════════════════════
// INSTANCE VALUES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Member values keyed by member name, checked against the schema at runtime.
 *
 * Integers may be given as bigint, safe-integer number or decimal/hex string;
 * byte strings and addresses as 0x hex or Uint8Array; nested structs as a
 * StructInstance or a plain object of member values.
 */
export type StructValues = Readonly<Record<string, unknown>>;

// ═══════════════════════════════════════════════════════════════════════════
// TYPED MESSAGE
// ═══════════════════════════════════════════════════════════════════════════

export interface TypedDataField {
  name: string;
  type: string;
}

export type TypedDataTypes = Record<string, TypedDataField[]>;

export type MessageValue =
  | boolean
  | string
  | number
  | bigint
  | MessageData
  | readonly MessageValue[];

export interface MessageData {
  [member: string]: MessageValue;
}

/**
 * Standard EIP-712 message record, as passed to eth_signTypedData_v4
 */
export interface TypedMessage {
  types: TypedDataTypes;
  primaryType: string;
  domain: MessageData;
  message: MessageData;
}
