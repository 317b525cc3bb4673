import { makeDomain } from '../src/ts/eip712';
import { address, string } from '../src/ts/memberTypes';
import { StructSchema } from '../src/ts/schema';
import type { Address } from '../src/ts/types';

// The Mail / Person example from the EIP-712 document, with its published vectors
export const COW_WALLET: Address = '0xCD2a3d9F938E13CD947Ec05AbC7FE734Df8DD826';
export const BOB_WALLET: Address = '0xbBbBBBBbbBBBbbbBbbBbbbbBBbBbbbbBbBbbBBbB';
export const VERIFYING_CONTRACT: Address = '0xCcCCccccCCCCcCCCCCCcCcCccCcCCCcCcccccccC';

export const MAIL_ENCODE_TYPE =
  'Mail(Person from,Person to,string contents)Person(string name,address wallet)';
export const MAIL_TYPE_HASH =
  '0xa0cedeb2dc280ba39b857546d74f5549c3a1d7bdc2dd96bf881f76108e23dac2';
export const PERSON_TYPE_HASH =
  '0xb9d8c78acf9b987311de6c7b45bb6a9c8e1bf361fa7fd3467a2163f994c79500';
export const COW_HASH = '0xfc71e5fa27ff56c350aa531bc129ebdf613b772b6604664f5d8dbe21b85eb0c8';
export const BOB_HASH = '0xcd54f074a4af31b4411ff6a60c9719dbd559c221c8ac3492d9d872b041d703d1';
export const CONTENTS_HASH =
  '0xb5aadf3154a261abdd9086fc627b61efca26ae5702701d05cd2305f7c52a2fc8';
export const MAIL_HASH = '0xc52c0ee5d84264471806290a3f2c4cecfc5490626bf912d01f240d7a274b371e';
export const DOMAIN_TYPE_HASH =
  '0x8b73c3c69bb8fe3d512ecc4cf759cc79239f7b179b0ffacaa9a75d522b39400f';
export const DOMAIN_SEPARATOR =
  '0xf2cee375fa42b42143804025fc449deafd50cc031ca257e0b194a650a912090f';
export const SIGNABLE_DIGEST =
  '0xbe609aee343fb3c4b28e1df9e632fca64fcfaede20f02e86244efddf30957bd2';

/** keccak256 of zero bytes */
export const EMPTY_HASH = '0xc5d2460186f7233c927e7db2dcc703c0e500b653ca82273b7bfad8045d85a470';

/**
 * Fresh schemas per test; schemas seal on first use.
 */
export function mailSchemas(): { Person: StructSchema; Mail: StructSchema } {
  const Person = new StructSchema('Person', { name: string(), wallet: address() });
  const Mail = new StructSchema('Mail', { from: Person, to: Person, contents: string() });
  return { Person, Mail };
}

export function mailValues() {
  return {
    from: { name: 'Cow', wallet: COW_WALLET },
    to: { name: 'Bob', wallet: BOB_WALLET },
    contents: 'Hello, Bob!',
  };
}

export function etherMailDomain() {
  return makeDomain({
    name: 'Ether Mail',
    version: '1',
    chainId: 1,
    verifyingContract: VERIFYING_CONTRACT,
  });
}
