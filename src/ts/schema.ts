/**
 * Struct schema
 * A named, ordered list of typed members. Mutable until first resolved or encoded.
 */

import { SchemaDefinitionError } from './errors';
import { StructInstance } from './encoder';
import { toMemberType, typeName, type MemberType } from './memberTypes';
import type { StructValues } from './types';

export type MemberTypeInput = MemberType | StructSchema;

export interface StructMember {
  readonly name: string;
  readonly type: MemberType;
}

/**
 * Members as an object (insertion order is kept) or as an explicit list of pairs.
 */
export type MemberDeclarations =
  | Readonly<Record<string, MemberTypeInput>>
  | ReadonlyArray<readonly [string, MemberTypeInput]>;

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;
const PRIMITIVE_NAME = /^(address|bool|string|bytes\d*|u?int\d*)$/;

export class StructSchema {
  readonly name: string;
  private readonly declared = new Map<string, MemberType>();
  private sealed = false;

  constructor(name: string, members: MemberDeclarations = []) {
    if (!IDENTIFIER.test(name) || PRIMITIVE_NAME.test(name)) {
      throw new SchemaDefinitionError(`"${name}" is not a valid struct name`);
    }
    this.name = name;
    const entries = isDeclarationList(members) ? members : Object.entries(members);
    for (const [member, type] of entries) {
      this.addMember(member, type);
    }
  }

  /**
   * Append a member. Fails once the schema has been used for resolution or encoding.
   */
  addMember(name: string, type: MemberTypeInput): this {
    if (this.sealed) {
      throw new SchemaDefinitionError(
        `Cannot add "${name}" to ${this.name}: the struct is already in use`
      );
    }
    if (!IDENTIFIER.test(name)) {
      throw new SchemaDefinitionError(`"${name}" is not a valid member name in ${this.name}`);
    }
    if (this.declared.has(name)) {
      throw new SchemaDefinitionError(`Duplicate member "${name}" in ${this.name}`);
    }
    this.declared.set(name, toMemberType(type));
    return this;
  }

  get members(): StructMember[] {
    return [...this.declared].map(([name, type]) => ({ name, type }));
  }

  get memberCount(): number {
    return this.declared.size;
  }

  hasMember(name: string): boolean {
    return this.declared.has(name);
  }

  getMember(name: string): MemberType | undefined {
    return this.declared.get(name);
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  /** Freeze the member list. Called implicitly on first use. */
  seal(): void {
    this.sealed = true;
  }

  /**
   * This struct's own signature, without referenced structs: `Name(type1 name1,type2 name2)`
   */
  encodeOwnType(): string {
    const members = this.members.map(({ name, type }) => `${typeName(type)} ${name}`);
    return `${this.name}(${members.join(',')})`;
  }

  create(values: StructValues = {}): StructInstance {
    return new StructInstance(this, values);
  }
}

function isDeclarationList(
  members: MemberDeclarations
): members is ReadonlyArray<readonly [string, MemberTypeInput]> {
  return Array.isArray(members);
}

/**
 * Declare a struct type
 */
export function defineStruct(name: string, members: MemberDeclarations = []): StructSchema {
  return new StructSchema(name, members);
}
