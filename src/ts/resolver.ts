/**
 * Type graph resolution
 * encodeType / typeHash over a struct and everything it references
 */

import { keccak256, toHex } from 'viem';
import { ResolutionError } from './errors';
import { log } from './logger';
import type { MemberType } from './memberTypes';
import type { StructSchema } from './schema';
import type { Hex } from './types';

// sealed schemas never change, so their signatures can be cached
const encodedTypes = new WeakMap<StructSchema, string>();

/** Ordinal name comparison, independent of locale */
export function compareNames(a: StructSchema, b: StructSchema): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

function structDependency(type: MemberType): StructSchema | undefined {
  if (type.kind === 'struct') return type.schema;
  if (type.kind === 'array') return structDependency(type.element);
  return undefined;
}

/**
 * Every struct reachable from `root` (excluding root), sorted by name.
 * Seals every schema it reaches and rejects cyclic graphs.
 */
export function referencedStructs(root: StructSchema): StructSchema[] {
  const found = new Map<string, StructSchema>();

  const visit = (schema: StructSchema, path: string[]): void => {
    schema.seal();
    for (const member of schema.members) {
      const dependency = structDependency(member.type);
      if (!dependency) continue;

      if (path.includes(dependency.name)) {
        throw new ResolutionError(
          `Cyclic struct reference: ${[...path, dependency.name].join(' -> ')}`
        );
      }

      const known = found.get(dependency.name);
      if (known) {
        if (known !== dependency) assertSameShape(known, dependency);
        continue;
      }

      found.set(dependency.name, dependency);
      visit(dependency, [...path, dependency.name]);
    }
  };

  visit(root, [root.name]);
  return [...found.values()].sort(compareNames);
}

/**
 * Two schemas sharing a name must resolve to the same full signature,
 * nested structs included.
 */
function assertSameShape(known: StructSchema, other: StructSchema): void {
  const expected = encodeType(known);
  const actual = encodeType(other);
  if (expected !== actual) {
    throw new ResolutionError(
      `Two different structs are named ${other.name}: ${expected} and ${actual}`
    );
  }
}

/**
 * Canonical type signature: the root struct first, then referenced structs by name
 */
export function encodeType(root: StructSchema): string {
  const cached = encodedTypes.get(root);
  if (cached !== undefined) return cached;

  const dependencies = referencedStructs(root);
  const encoded = [root, ...dependencies].map((schema) => schema.encodeOwnType()).join('');
  encodedTypes.set(root, encoded);

  log.debug('Resolved struct type', {
    type: root.name,
    dependencies: dependencies.map((schema) => schema.name),
  });
  return encoded;
}

/**
 * keccak256 of the UTF-8 encodeType string
 */
export function typeHash(root: StructSchema): Hex {
  return keccak256(toHex(encodeType(root)));
}
