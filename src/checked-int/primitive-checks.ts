/**
 * Copyright 2026 Arm Limited
 *
 * Licensed under the Apache License, Version 2.0 (the "License");
 * you may not use this file except in compliance with the License.
 * You may obtain a copy of the License at
 *
 *     http://www.apache.org/licenses/LICENSE-2.0
 *
 * Unless required by applicable law or agreed to in writing, software
 * distributed under the License is distributed on an "AS IS" BASIS,
 * WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
 * See the License for the specific language governing permissions and
 * limitations under the License.
 */

/**
 * Same-type overflow checks. Every check receives two operands already known
 * to be of `type` and returns the exact result, or undefined when the machine
 * operation would overflow, divide by zero, or shift outside the type.
 */

import { fitsType, isSigned, maxOf, minOf, type IntType } from './int-types';

export type OpKind = 'add' | 'sub' | 'mul' | 'div' | 'mod' | 'shl' | 'shr';
export type OpSymbol = '+' | '-' | '*' | '/' | '%' | '<<' | '>>';

export const OP_KINDS: readonly OpKind[] = ['add', 'sub', 'mul', 'div', 'mod', 'shl', 'shr'];

export const OP_SYMBOLS: Readonly<Record<OpKind, OpSymbol>> = {
    add: '+',
    sub: '-',
    mul: '*',
    div: '/',
    mod: '%',
    shl: '<<',
    shr: '>>',
};

export const SYMBOL_OPS: Readonly<Record<OpSymbol, OpKind>> = {
    '+': 'add',
    '-': 'sub',
    '*': 'mul',
    '/': 'div',
    '%': 'mod',
    '<<': 'shl',
    '>>': 'shr',
};

export type PrimitiveCheck = (a: bigint, b: bigint, type: IntType) => bigint | undefined;

export const checkUnsignedAdd: PrimitiveCheck = (a, b, type) => (
    b <= maxOf(type) - a ? a + b : undefined
);

export const checkSignedAdd: PrimitiveCheck = (a, b, type) => {
    if (a > 0n && b > 0n) {
        return a <= maxOf(type) - b ? a + b : undefined;
    }
    if (a <= 0n && b <= 0n) {
        return a >= minOf(type) - b ? a + b : undefined;
    }
    // mixed signs cannot leave the range
    return a + b;
};

export const checkUnsignedSub: PrimitiveCheck = (a, b) => (a >= b ? a - b : undefined);

export const checkSignedSub: PrimitiveCheck = (a, b, type) => {
    if (b <= 0n && a > maxOf(type) + b) {
        return undefined;
    }
    if (b > 0n && a < minOf(type) + b) {
        return undefined;
    }
    return a - b;
};

export const checkUnsignedMul: PrimitiveCheck = (a, b, type) => (
    b === 0n || a <= maxOf(type) / b ? a * b : undefined
);

export const checkSignedMul: PrimitiveCheck = (a, b, type) => {
    const min = minOf(type);
    const max = maxOf(type);
    let ok: boolean;
    if (a > 0n) {
        ok = b > 0n ? a <= max / b : b >= min / a;
    } else {
        ok = b > 0n ? a >= min / b : (a === 0n || b >= max / a);
    }
    return ok ? a * b : undefined;
};

export const checkUnsignedDiv: PrimitiveCheck = (a, b) => (b !== 0n ? a / b : undefined);

export const checkSignedDiv: PrimitiveCheck = (a, b, type) => (
    b !== 0n && !(a === minOf(type) && b === -1n) ? a / b : undefined
);

export const checkUnsignedMod: PrimitiveCheck = (a, b) => (b !== 0n ? a % b : undefined);

// MIN % -1 is rejected along with MIN / -1: the machine instruction traps on both.
export const checkSignedMod: PrimitiveCheck = (a, b, type) => (
    b !== 0n && !(a === minOf(type) && b === -1n) ? a % b : undefined
);

export const checkUnsignedShl: PrimitiveCheck = (a, b, type) => (
    b < BigInt(type.bits) && a <= maxOf(type) >> b ? a << b : undefined
);

export const checkSignedShl: PrimitiveCheck = (a, b, type) => (
    a >= 0n && b >= 0n && b < BigInt(type.bits) && a <= maxOf(type) >> b ? a << b : undefined
);

export const checkUnsignedShr: PrimitiveCheck = (a, b, type) => (
    b < BigInt(type.bits) ? a >> b : undefined
);

export const checkSignedShr: PrimitiveCheck = (a, b, type) => (
    a >= 0n && b >= 0n && b < BigInt(type.bits) ? a >> b : undefined
);

interface PrimitivePair {
    unsigned: PrimitiveCheck;
    signed: PrimitiveCheck;
}

const PRIMITIVES: Readonly<Record<OpKind, PrimitivePair>> = {
    add: { unsigned: checkUnsignedAdd, signed: checkSignedAdd },
    sub: { unsigned: checkUnsignedSub, signed: checkSignedSub },
    mul: { unsigned: checkUnsignedMul, signed: checkSignedMul },
    div: { unsigned: checkUnsignedDiv, signed: checkSignedDiv },
    mod: { unsigned: checkUnsignedMod, signed: checkSignedMod },
    shl: { unsigned: checkUnsignedShl, signed: checkSignedShl },
    shr: { unsigned: checkUnsignedShr, signed: checkSignedShr },
};

export function primitiveFor(op: OpKind, type: IntType): PrimitiveCheck {
    const pair = PRIMITIVES[op];
    return isSigned(type) ? pair.signed : pair.unsigned;
}

export function checkPrimitive(op: OpKind, type: IntType, a: bigint, b: bigint): bigint | undefined {
    if (!fitsType(a, type) || !fitsType(b, type)) {
        return undefined;
    }
    return primitiveFor(op, type)(a, b, type);
}
