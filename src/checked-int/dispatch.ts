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
 * Binary operations on possibly differently typed operands. The right operand
 * is always brought into the left operand's type first, and only when that
 * does not change its value.
 */

import { canReinterpret } from './cast-safety';
import { checkPrimitive, type OpKind } from './primitive-checks';
import { type IntType, type IntValue, type ValueSlot } from './int-types';

export type FailureReason =
    | 'overflow'
    | 'division'
    | 'shift'
    | 'cast'
    | 'syntax'
    | 'operand-count'
    | 'operand-range';

export type OpResult =
    | { ok: true; value: IntValue }
    | { ok: false; reason: FailureReason };

export function failureReasonForOp(op: OpKind): FailureReason {
    switch (op) {
        case 'div':
        case 'mod':
            return 'division';
        case 'shl':
        case 'shr':
            return 'shift';
        default:
            return 'overflow';
    }
}

function applyInType(op: OpKind, type: IntType, a: bigint, b: bigint): OpResult {
    const out = checkPrimitive(op, type, a, b);
    if (out === undefined) {
        return { ok: false, reason: failureReasonForOp(op) };
    }
    return { ok: true, value: { type, value: out } };
}

export function applyBinaryOp(op: OpKind, a: IntValue, b: IntValue): OpResult {
    if (!canReinterpret(b, a.type)) {
        return { ok: false, reason: 'cast' };
    }
    return applyInType(op, a.type, a.value, b.value);
}

export function checkedBinaryOp(op: OpKind, a: IntValue, b: IntValue): IntValue | undefined {
    const result = applyBinaryOp(op, a, b);
    return result.ok ? result.value : undefined;
}

export const checkedAdd = (a: IntValue, b: IntValue): IntValue | undefined => checkedBinaryOp('add', a, b);
export const checkedSub = (a: IntValue, b: IntValue): IntValue | undefined => checkedBinaryOp('sub', a, b);
export const checkedMul = (a: IntValue, b: IntValue): IntValue | undefined => checkedBinaryOp('mul', a, b);
export const checkedDiv = (a: IntValue, b: IntValue): IntValue | undefined => checkedBinaryOp('div', a, b);
export const checkedMod = (a: IntValue, b: IntValue): IntValue | undefined => checkedBinaryOp('mod', a, b);
export const checkedShl = (a: IntValue, b: IntValue): IntValue | undefined => checkedBinaryOp('shl', a, b);
export const checkedShr = (a: IntValue, b: IntValue): IntValue | undefined => checkedBinaryOp('shr', a, b);

/**
 * Slot form of {@link checkedBinaryOp}: returns whether the operation was
 * safe and writes `out.value` only in that case.
 */
export function safeBinaryOp(op: OpKind, out: ValueSlot<bigint> | undefined, a: IntValue, b: IntValue): boolean {
    const result = applyBinaryOp(op, a, b);
    if (!result.ok) {
        return false;
    }
    if (out) {
        out.value = result.value.value;
    }
    return true;
}

type SlotOp = (out: ValueSlot<bigint> | undefined, a: IntValue, b: IntValue) => boolean;

export const safeAdd: SlotOp = (out, a, b) => safeBinaryOp('add', out, a, b);
export const safeSub: SlotOp = (out, a, b) => safeBinaryOp('sub', out, a, b);
export const safeMul: SlotOp = (out, a, b) => safeBinaryOp('mul', out, a, b);
export const safeDiv: SlotOp = (out, a, b) => safeBinaryOp('div', out, a, b);
export const safeMod: SlotOp = (out, a, b) => safeBinaryOp('mod', out, a, b);
export const safeShl: SlotOp = (out, a, b) => safeBinaryOp('shl', out, a, b);
export const safeShr: SlotOp = (out, a, b) => safeBinaryOp('shr', out, a, b);

export function checkedInc(v: IntValue): IntValue | undefined {
    return checkedBinaryOp('add', v, { type: v.type, value: 1n });
}

export function checkedDec(v: IntValue): IntValue | undefined {
    return checkedBinaryOp('sub', v, { type: v.type, value: 1n });
}

export function safeInc(slot: ValueSlot<IntValue>): boolean {
    const out = checkedInc(slot.value);
    if (!out) {
        return false;
    }
    slot.value = out;
    return true;
}

export function safeDec(slot: ValueSlot<IntValue>): boolean {
    const out = checkedDec(slot.value);
    if (!out) {
        return false;
    }
    slot.value = out;
    return true;
}

/**
 * Computes `a op b` in `target` rather than in `a`'s type, e.g. a `u64`
 * product of two `u32` values. Both operands must survive the cast.
 */
export function applyOpInto(op: OpKind, target: IntType, a: IntValue, b: IntValue): OpResult {
    if (!canReinterpret(a, target) || !canReinterpret(b, target)) {
        return { ok: false, reason: 'cast' };
    }
    return applyInType(op, target, a.value, b.value);
}

export function checkedOpInto(op: OpKind, target: IntType, a: IntValue, b: IntValue): IntValue | undefined {
    const result = applyOpInto(op, target, a, b);
    return result.ok ? result.value : undefined;
}

/**
 * Folds `operands` left to right with `op` in `target`. Every operand is
 * cast-checked before the first operation runs.
 */
export function checkedChain(op: OpKind, target: IntType, operands: readonly IntValue[]): IntValue | undefined {
    if (operands.length < 2) {
        return undefined;
    }
    if (!operands.every(operand => canReinterpret(operand, target))) {
        return undefined;
    }
    let acc = operands[0].value;
    for (const operand of operands.slice(1)) {
        const next = checkPrimitive(op, target, acc, operand.value);
        if (next === undefined) {
            return undefined;
        }
        acc = next;
    }
    return { type: target, value: acc };
}
