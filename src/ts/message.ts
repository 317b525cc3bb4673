/**
 * Conversion between struct instances and the standard typed message record
 * ({ types, primaryType, domain, message }).
 */

import { z } from 'zod';
import { DOMAIN_TYPE, resolveDomain } from './eip712';
import { StructInstance } from './encoder';
import { ResolutionError, SchemaDefinitionError, ValidationError } from './errors';
import { log } from './logger';
import {
  address,
  array,
  bool,
  bytes,
  int,
  string,
  struct,
  typeName,
  uint,
  type MemberType,
} from './memberTypes';
import { compareNames, encodeType, referencedStructs } from './resolver';
import { StructSchema } from './schema';
import type { TypedDataTypes, TypedMessage } from './types';

const TypedMessageSchema = z.object({
  types: z.record(z.string(), z.array(z.object({ name: z.string(), type: z.string() }))),
  primaryType: z.string(),
  domain: z.record(z.string(), z.unknown()),
  message: z.record(z.string(), z.unknown()),
});

export interface StructPair {
  message: StructInstance;
  domain: StructInstance;
}

// ═══════════════════════════════════════════════════════════════════════════
// TO MESSAGE
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Render an instance and its domain as a typed message record.
 * The domain must be an EIP712Domain instance. `types` lists the domain type,
 * the primary type, then every referenced struct by name.
 */
export function toMessage(instance: StructInstance, domain?: StructInstance): TypedMessage {
  const resolvedDomain = resolveDomain(domain);
  if (resolvedDomain.schema.name !== DOMAIN_TYPE) {
    throw new ValidationError(
      `expected an ${DOMAIN_TYPE} instance, got ${resolvedDomain.schema.name}`,
      'domain'
    );
  }
  const roots = [resolvedDomain.schema, instance.schema];
  const dependencies = roots.flatMap((root) => referencedStructs(root)).sort(compareNames);

  // one entry per name; a name reused for another shape cannot be expressed in `types`
  const schemas = new Map<string, StructSchema>();
  for (const schema of [...roots, ...dependencies]) {
    const known = schemas.get(schema.name);
    if (!known) {
      schemas.set(schema.name, schema);
    } else if (known !== schema) {
      const expected = encodeType(known);
      const actual = encodeType(schema);
      if (expected !== actual) {
        throw new ResolutionError(
          `Two different structs are named ${schema.name}: ${expected} and ${actual}`
        );
      }
    }
  }

  const types: TypedDataTypes = {};
  for (const schema of schemas.values()) {
    types[schema.name] = schema.members.map(({ name, type }) => ({
      name,
      type: typeName(type),
    }));
  }

  return {
    types,
    primaryType: instance.schema.name,
    domain: resolvedDomain.toData(),
    message: instance.toData(),
  };
}

function jsonReplacer(_key: string, value: unknown): unknown {
  if (typeof value !== 'bigint') return value;
  const safe =
    value >= BigInt(Number.MIN_SAFE_INTEGER) && value <= BigInt(Number.MAX_SAFE_INTEGER);
  return safe ? Number(value) : value.toString();
}

/**
 * toMessage as JSON text. Integers beyond the safe range are written as decimal strings.
 */
export function toMessageJson(
  instance: StructInstance,
  domain?: StructInstance,
  space?: number
): string {
  return JSON.stringify(toMessage(instance, domain), jsonReplacer, space);
}

// ═══════════════════════════════════════════════════════════════════════════
// FROM MESSAGE
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Rebuild the schemas declared in a typed message record and instantiate
 * its message and domain.
 */
export function fromMessage(record: unknown): StructPair {
  const parsed = TypedMessageSchema.safeParse(record);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new SchemaDefinitionError(`Malformed typed message: ${issues}`);
  }
  const { types, primaryType, domain, message } = parsed.data;

  // declare every struct first so members can reference them in any order
  const schemas = new Map<string, StructSchema>();
  for (const name of Object.keys(types)) {
    schemas.set(name, new StructSchema(name));
  }
  for (const [name, fields] of Object.entries(types)) {
    const schema = requireDeclared(schemas, name, 'types');
    for (const field of fields) {
      schema.addMember(field.name, parseType(field.type, schemas, `${name}.${field.name}`));
    }
  }

  const primary = requireDeclared(schemas, primaryType, 'primaryType');
  const domainSchema = requireDeclared(schemas, DOMAIN_TYPE, 'domain');
  warnUnreferenced(schemas, [primary, domainSchema]);

  return {
    message: new StructInstance(primary, message),
    domain: new StructInstance(domainSchema, domain),
  };
}

/**
 * fromMessage over JSON text
 */
export function fromMessageJson(json: string): StructPair {
  let record: unknown;
  try {
    record = JSON.parse(json);
  } catch (err) {
    throw new SchemaDefinitionError(
      `Typed message is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err }
    );
  }
  return fromMessage(record);
}

function requireDeclared(
  schemas: Map<string, StructSchema>,
  name: string,
  context: string
): StructSchema {
  const schema = schemas.get(name);
  if (!schema) {
    throw new SchemaDefinitionError(`${context} references undeclared type "${name}"`);
  }
  return schema;
}

function warnUnreferenced(schemas: Map<string, StructSchema>, roots: StructSchema[]): void {
  const reachable = new Set<string>();
  for (const root of roots) {
    reachable.add(root.name);
    for (const schema of referencedStructs(root)) reachable.add(schema.name);
  }
  const unreferenced = [...schemas.keys()].filter((name) => !reachable.has(name));
  if (unreferenced.length > 0) {
    log.warn('Typed message declares unreferenced types', { types: unreferenced });
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// TYPE STRINGS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Parse a type string such as `uint256`, `Person[]` or `bytes32[2][]`.
 */
export function parseType(
  rawType: string,
  schemas: ReadonlyMap<string, StructSchema>,
  context: string
): MemberType {
  const { baseType, arrayLevels } = extractArrayLevels(rawType);
  let type = parseBaseType(baseType, schemas, context);
  for (const level of arrayLevels) {
    type = array(type, level ?? undefined);
  }
  return type;
}

/**
 * Split trailing array suffixes off a type, innermost level first.
 */
function extractArrayLevels(type: string): {
  baseType: string;
  arrayLevels: Array<number | null>;
} {
  const arrayLevels: Array<number | null> = [];
  let remaining = type;

  const pattern = /^(.*)\[([1-9][0-9]*)?\]$/;
  let match = remaining.match(pattern);
  while (match) {
    remaining = match[1];
    arrayLevels.unshift(match[2] ? parseInt(match[2], 10) : null);
    match = remaining.match(pattern);
  }

  return { baseType: remaining, arrayLevels };
}

function parseBaseType(
  baseType: string,
  schemas: ReadonlyMap<string, StructSchema>,
  context: string
): MemberType {
  switch (baseType) {
    case 'address':
      return address();
    case 'bool':
      return bool();
    case 'string':
      return string();
    case 'bytes':
      return bytes();
  }

  const sized = baseType.match(/^(bytes|int|uint)(\d+)$/);
  if (sized) {
    if (sized[2].startsWith('0')) {
      throw new SchemaDefinitionError(`${context} has invalid type "${baseType}"`);
    }
    const width = parseInt(sized[2], 10);
    if (sized[1] === 'bytes') return bytes(width);
    return sized[1] === 'int' ? int(width) : uint(width);
  }
  if (baseType === 'int') return int();
  if (baseType === 'uint') return uint();

  const schema = schemas.get(baseType);
  if (!schema) {
    throw new SchemaDefinitionError(`${context} references undeclared type "${baseType}"`);
  }
  return struct(schema);
}
