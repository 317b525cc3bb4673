/**
 * EIP-712 domain separator and signable digest
 */

import { concatHex, keccak256 } from 'viem';
import { ResolutionError, ValidationError } from './errors';
import { StructInstance, hashStruct } from './encoder';
import { log } from './logger';
import { address, bytes, string, uint } from './memberTypes';
import { StructSchema } from './schema';
import type { Address, Hex } from './types';

export const DOMAIN_TYPE = 'EIP712Domain';

/** Version byte 0x01 of the 0x19 signed-data prefix */
export const SIGNING_PREFIX: Hex = '0x1901';

// ═══════════════════════════════════════════════════════════════════════════
// DOMAIN BUILDERS
// ═══════════════════════════════════════════════════════════════════════════

export interface DomainParams {
  name?: string;
  version?: string;
  chainId?: bigint | number | string;
  verifyingContract?: Address | Uint8Array;
  salt?: Hex | Uint8Array;
}

/**
 * Build an EIP712Domain instance. Only the fields given are declared and encoded.
 */
export function makeDomain(params: DomainParams): StructInstance {
  const schema = new StructSchema(DOMAIN_TYPE);
  const values: Record<string, unknown> = {};

  if (params.name !== undefined) {
    schema.addMember('name', string());
    values.name = params.name;
  }
  if (params.version !== undefined) {
    schema.addMember('version', string());
    values.version = params.version;
  }
  if (params.chainId !== undefined) {
    schema.addMember('chainId', uint(256));
    values.chainId = params.chainId;
  }
  if (params.verifyingContract !== undefined) {
    schema.addMember('verifyingContract', address());
    values.verifyingContract = params.verifyingContract;
  }
  if (params.salt !== undefined) {
    schema.addMember('salt', bytes(32));
    values.salt = params.salt;
  }

  if (schema.memberCount === 0) {
    throw new ValidationError('At least one domain field must be given');
  }
  return new StructInstance(schema, values);
}

// ═══════════════════════════════════════════════════════════════════════════
// DEFAULT DOMAIN
// ═══════════════════════════════════════════════════════════════════════════

// Process-wide and last-writer-wins. Pass a domain explicitly where that matters.
let defaultDomain: StructInstance | undefined;

export function setDefaultDomain(domain: StructInstance | undefined): void {
  defaultDomain = domain;
  log.debug(domain ? 'Default domain set' : 'Default domain cleared', {
    domain: domain?.schema.encodeOwnType(),
  });
}

export function getDefaultDomain(): StructInstance | undefined {
  return defaultDomain;
}

/**
 * The given domain, else the default domain
 */
export function resolveDomain(domain?: StructInstance): StructInstance {
  const resolved = domain ?? defaultDomain;
  if (!resolved) {
    throw new ResolutionError('A domain must be given, or a default domain must be set');
  }
  return resolved;
}

// ═══════════════════════════════════════════════════════════════════════════
// DIGEST
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Hash a domain (its struct hash, a.k.a. the domain separator)
 */
export function hashDomain(domain: StructInstance): Hex {
  return hashStruct(domain);
}

/**
 * 0x1901 || domainSeparator || hashStruct(message), 66 bytes
 */
export function signingPreimage(message: StructInstance, domain?: StructInstance): Hex {
  return concatHex([SIGNING_PREFIX, hashDomain(resolveDomain(domain)), hashStruct(message)]);
}

/**
 * The 32-byte digest to sign
 */
export function signableBytes(message: StructInstance, domain?: StructInstance): Hex {
  return keccak256(signingPreimage(message, domain));
}
