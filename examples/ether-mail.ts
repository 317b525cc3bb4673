/**
 * Ether Mail: define two structs, hash a message and round-trip it
 * through the typed message JSON record.
 */

import {
  StructSchema,
  address,
  encodeType,
  fromMessageJson,
  hashDomain,
  makeDomain,
  signableBytes,
  string,
  toMessageJson,
  typeHash,
} from '../src/ts';

// ═══════════════════════════════════════════════════════════════════════════
// STEP 1: DECLARE SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════

const Person = new StructSchema('Person', { name: string(), wallet: address() });
const Mail = new StructSchema('Mail', { from: Person, to: Person, contents: string() });

const domain = makeDomain({
  name: 'Ether Mail',
  version: '1',
  chainId: 1,
  verifyingContract: '0xCcCCccccCCCCcCCCCCCcCcCccCcCCCcCcccccccC',
});

// ═══════════════════════════════════════════════════════════════════════════
// STEP 2: BUILD AND HASH A MESSAGE
// ═══════════════════════════════════════════════════════════════════════════

function main(): void {
  console.log('═══════════════════════════════════════════════════════════');
  console.log('                 Typed data: Ether Mail');
  console.log('═══════════════════════════════════════════════════════════\n');

  const mail = Mail.create({
    from: { name: 'Cow', wallet: '0xCD2a3d9F938E13CD947Ec05AbC7FE734Df8DD826' },
    to: { name: 'Bob', wallet: '0xbBbBBBBbbBBBbbbBbbBbbbbBBbBbbbbBbBbbBBbB' },
    contents: 'Hello, Bob!',
  });

  console.log(`   Type:             ${encodeType(Mail)}`);
  console.log(`   Type hash:        ${typeHash(Mail)}`);
  console.log(`   Struct hash:      ${mail.hashStruct()}`);
  console.log(`   Domain separator: ${hashDomain(domain)}`);
  console.log(`   Digest:           ${signableBytes(mail, domain)}`);

  // ═════════════════════════════════════════════════════════════════════════
  // STEP 3: ROUND-TRIP THROUGH JSON
  // ═════════════════════════════════════════════════════════════════════════

  const json = toMessageJson(mail, domain, 2);
  console.log(`\n🔷 Typed message record\n${json}`);

  const restored = fromMessageJson(json);
  const same = signableBytes(restored.message, restored.domain) === signableBytes(mail, domain);
  console.log(`\n   ${same ? '✅' : '❌'} Restored message hashes to the same digest`);
}

main();
