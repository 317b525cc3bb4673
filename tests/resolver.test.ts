import { describe, expect, it } from 'vitest';
import { keccak256, toHex } from 'viem';
import { ResolutionError } from '../src/ts/errors';
import { array, bool, string, uint } from '../src/ts/memberTypes';
import { encodeType, referencedStructs, typeHash } from '../src/ts/resolver';
import { StructSchema } from '../src/ts/schema';
import { MAIL_ENCODE_TYPE, MAIL_TYPE_HASH, PERSON_TYPE_HASH, mailSchemas } from './fixtures';

describe('encodeType', () => {
  it('matches the reference Mail signature', () => {
    const { Mail, Person } = mailSchemas();
    expect(encodeType(Mail)).toBe(MAIL_ENCODE_TYPE);
    expect(encodeType(Person)).toBe('Person(string name,address wallet)');
  });

  it('sorts referenced structs by name with the root first', () => {
    const A = new StructSchema('A', { a: string() });
    const B = new StructSchema('B', { b: uint(8) });
    const Outer = new StructSchema('Outer', { first: B, second: A });
    expect(encodeType(Outer)).toBe('Outer(B first,A second)A(string a)B(uint8 b)');
  });

  it('includes transitive references and collapses duplicates', () => {
    const Beta = new StructSchema('Beta', { b: bool() });
    const Alpha = new StructSchema('Alpha', { a: uint() });
    const Zeta = new StructSchema('Zeta', { beta: Beta });
    const Root = new StructSchema('Root', { zeta: Zeta, alpha: Alpha, again: Beta });
    expect(encodeType(Root)).toBe(
      'Root(Zeta zeta,Alpha alpha,Beta again)Alpha(uint256 a)Beta(bool b)Zeta(Beta beta)'
    );
  });

  it('follows struct references inside arrays', () => {
    const Person = new StructSchema('Person', { name: string() });
    const Group = new StructSchema('Group', { members: array(Person), pairs: array(array(Person, 2)) });
    expect(encodeType(Group)).toBe('Group(Person[] members,Person[2][] pairs)Person(string name)');
  });

  it('compares names by code unit, not locale', () => {
    const apple = new StructSchema('apple', { a: bool() });
    const Banana = new StructSchema('Banana', { b: bool() });
    const Root = new StructSchema('Root', { x: apple, y: Banana });
    expect(encodeType(Root)).toBe('Root(apple x,Banana y)Banana(bool b)apple(bool a)');
  });

  it('rejects self references', () => {
    const Node = new StructSchema('Node', { value: uint() });
    Node.addMember('children', array(Node));
    expect(() => encodeType(Node)).toThrow(ResolutionError);
  });

  it('rejects mutual references', () => {
    const A = new StructSchema('A');
    const B = new StructSchema('B', { a: A });
    A.addMember('b', B);
    expect(() => encodeType(A)).toThrow('Cyclic struct reference: A -> B -> A');
  });

  it('rejects two different structs sharing a name', () => {
    const PersonV1 = new StructSchema('Person', { name: string() });
    const PersonV2 = new StructSchema('Person', { name: string(), age: uint(8) });
    const Pair = new StructSchema('Pair', { left: PersonV1, right: PersonV2 });
    expect(() => encodeType(Pair)).toThrow(ResolutionError);
  });

  it('rejects same-named structs whose nested structs differ', () => {
    const TextInner = new StructSchema('Inner', { a: string() });
    const NumberInner = new StructSchema('Inner', { a: uint() });
    const left = new StructSchema('P', { x: TextInner });
    const right = new StructSchema('P', { x: NumberInner });
    const Root = new StructSchema('Root', { left, right });
    expect(() => encodeType(Root)).toThrow(
      'Two different structs are named P: P(Inner x)Inner(string a) and P(Inner x)Inner(uint256 a)'
    );
  });

  it('accepts identically shaped structs sharing a name', () => {
    const left = new StructSchema('Person', { name: string() });
    const right = new StructSchema('Person', { name: string() });
    const Pair = new StructSchema('Pair', { left, right });
    expect(encodeType(Pair)).toBe('Pair(Person left,Person right)Person(string name)');
  });
});

describe('referencedStructs', () => {
  it('lists dependencies by name, without the root', () => {
    const { Mail, Person } = mailSchemas();
    expect(referencedStructs(Mail)).toEqual([Person]);
    expect(referencedStructs(Person)).toEqual([]);
  });
});

describe('typeHash', () => {
  it('matches the reference type hashes', () => {
    const { Mail, Person } = mailSchemas();
    expect(typeHash(Mail)).toBe(MAIL_TYPE_HASH);
    expect(typeHash(Person)).toBe(PERSON_TYPE_HASH);
  });

  it('hashes the UTF-8 signature', () => {
    const Empty = new StructSchema('Empty');
    expect(typeHash(Empty)).toBe(keccak256(toHex('Empty()')));
  });
});
