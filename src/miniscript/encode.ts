// Copyright (c) 2025 Jose-Luis Landabaso - https://bitcoinerlab.com
// Distributed under the MIT software license

import * as btc from '@scure/btc-signer';
const { OP } = btc;
import { hash160 } from '@scure/btc-signer/utils.js';
import type { MiniscriptKey, Hash160Value } from '../keys.js';
import { hash160Bytes, publicKeyBytes } from '../keys.js';
import { ScriptBuilder } from '../scriptUtils.js';
import type { Fragment } from './ast.js';
import type { ScriptContext } from './context.js';

const HASH_OPS = {
  sha256: OP.SHA256,
  hash256: OP.HASH256,
  ripemd160: OP.RIPEMD160,
  hash160: OP.HASH160
} as const;

/** Key as it is pushed in a script of context `ctx` */
export function keyBytes(key: MiniscriptKey, ctx: ScriptContext): Uint8Array {
  const bytes = publicKeyBytes(key);
  return ctx.name === 'Tap' && bytes.length === 33 ? bytes.slice(1) : bytes;
}

/**
 * Writes the script of `fragment` into `builder`.
 */
export function encodeFragment(
  fragment: Fragment<MiniscriptKey, Hash160Value>,
  ctx: ScriptContext,
  builder: ScriptBuilder
): ScriptBuilder {
  const encode = (child: Fragment<MiniscriptKey, Hash160Value>) =>
    encodeFragment(child, ctx, builder);
  const node = fragment.node;
  switch (node.type) {
    case 'true':
      return builder.pushInt(1);
    case 'false':
      return builder.pushInt(0);
    case 'pk_k':
      return builder.pushSlice(keyBytes(node.key, ctx));
    case 'pk_h':
    case 'raw_pkh':
      return builder
        .pushOpcode(OP.DUP)
        .pushOpcode(OP.HASH160)
        .pushSlice(
          node.type === 'pk_h'
            ? hash160(keyBytes(node.key, ctx))
            : hash160Bytes(node.hash)
        )
        .pushOpcode(OP.EQUALVERIFY);
    case 'after':
      return builder.pushInt(node.n).pushOpcode(OP.CHECKLOCKTIMEVERIFY);
    case 'older':
      return builder.pushInt(node.n).pushOpcode(OP.CHECKSEQUENCEVERIFY);
    case 'sha256':
    case 'hash256':
    case 'ripemd160':
    case 'hash160':
      return builder
        .pushOpcode(OP.SIZE)
        .pushInt(32)
        .pushOpcode(OP.EQUALVERIFY)
        .pushOpcode(HASH_OPS[node.type])
        .pushSlice(node.hash)
        .pushOpcode(OP.EQUAL);
    case 'alt':
      builder.pushOpcode(OP.TOALTSTACK);
      encode(node.sub);
      return builder.pushOpcode(OP.FROMALTSTACK);
    case 'swap':
      builder.pushOpcode(OP.SWAP);
      return encode(node.sub);
    case 'check':
      return encode(node.sub).pushOpcode(OP.CHECKSIG);
    case 'dupif':
      builder.pushOpcode(OP.DUP).pushOpcode(OP.IF);
      return encode(node.sub).pushOpcode(OP.ENDIF);
    case 'verify':
      return encode(node.sub).pushVerify();
    case 'nonzero':
      builder
        .pushOpcode(OP.SIZE)
        .pushOpcode(OP['0NOTEQUAL'])
        .pushOpcode(OP.IF);
      return encode(node.sub).pushOpcode(OP.ENDIF);
    case 'zeronotequal':
      return encode(node.sub).pushOpcode(OP['0NOTEQUAL']);
    case 'and_v':
      encode(node.left);
      return encode(node.right);
    case 'and_b':
      encode(node.left);
      return encode(node.right).pushOpcode(OP.BOOLAND);
    case 'or_b':
      encode(node.left);
      return encode(node.right).pushOpcode(OP.BOOLOR);
    case 'or_d':
      encode(node.left).pushOpcode(OP.IFDUP).pushOpcode(OP.NOTIF);
      return encode(node.right).pushOpcode(OP.ENDIF);
    case 'or_c':
      encode(node.left).pushOpcode(OP.NOTIF);
      return encode(node.right).pushOpcode(OP.ENDIF);
    case 'or_i':
      builder.pushOpcode(OP.IF);
      encode(node.left).pushOpcode(OP.ELSE);
      return encode(node.right).pushOpcode(OP.ENDIF);
    case 'andor':
      encode(node.a).pushOpcode(OP.NOTIF);
      encode(node.c).pushOpcode(OP.ELSE);
      return encode(node.b).pushOpcode(OP.ENDIF);
    case 'thresh':
      node.subs.forEach((sub, i) => {
        encode(sub);
        if (i > 0) builder.pushOpcode(OP.ADD);
      });
      return builder.pushInt(node.k).pushOpcode(OP.EQUAL);
    case 'multi':
      builder.pushInt(node.k);
      for (const key of node.keys) builder.pushSlice(keyBytes(key, ctx));
      return builder
        .pushInt(node.keys.length)
        .pushOpcode(OP.CHECKMULTISIG);
    case 'multi_a':
      node.keys.forEach((key, i) => {
        builder
          .pushSlice(keyBytes(key, ctx))
          .pushOpcode(i === 0 ? OP.CHECKSIG : OP.CHECKSIGADD);
      });
      return builder.pushInt(node.k).pushOpcode(OP.NUMEQUAL);
  }
}
