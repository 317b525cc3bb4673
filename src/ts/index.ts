/**
 * EIP-712 typed structured data
 * Struct schemas, canonical encoding and signable digests
 */

// Types
export type {
  Hex,
  Address,
  StructValues,
  TypedDataField,
  TypedDataTypes,
  MessageValue,
  MessageData,
  TypedMessage,
} from './types';

// Errors
export {
  TypedDataError,
  SchemaDefinitionError,
  ValidationError,
  ResolutionError,
} from './errors';

// Member types
export {
  address,
  bool,
  bytes,
  int,
  string,
  uint,
  array,
  struct,
  typeName,
  type MemberType,
  type PrimitiveType,
  type StructRefType,
  type ArrayType,
} from './memberTypes';

// Schemas
export {
  StructSchema,
  defineStruct,
  type MemberTypeInput,
  type MemberDeclarations,
  type StructMember,
} from './schema';

// Encoding
export { encodeType, typeHash, referencedStructs } from './resolver';
export {
  StructInstance,
  encodeValue,
  hashStruct,
  type NormalizedValue,
} from './encoder';

// EIP-712
export {
  DOMAIN_TYPE,
  makeDomain,
  setDefaultDomain,
  getDefaultDomain,
  hashDomain,
  signingPreimage,
  signableBytes,
  type DomainParams,
} from './eip712';
export {
  toMessage,
  toMessageJson,
  fromMessage,
  fromMessageJson,
  type StructPair,
} from './message';

// Config & logging
export { getConfig, resetConfig, type Config, type LogLevel } from './config';
export { log, getLogger, resetLogger } from './logger';
