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

export type IntKind = 'int' | 'uint';
export type IntBits = 8 | 16 | 32 | 64;
export type IntTypeName = 'u8' | 's8' | 'u16' | 's16' | 'u32' | 's32' | 'u64' | 's64';

export interface IntType {
    readonly kind: IntKind;
    readonly bits: IntBits;
    readonly name: IntTypeName;
}

export interface IntValue {
    readonly type: IntType;
    readonly value: bigint;
}

export interface ValueSlot<T> {
    value: T;
}

function makeType(kind: IntKind, bits: IntBits): IntType {
    const name = `${kind === 'uint' ? 'u' : 's'}${bits}` as const;
    return Object.freeze({ kind, bits, name });
}

export const U8 = makeType('uint', 8);
export const S8 = makeType('int', 8);
export const U16 = makeType('uint', 16);
export const S16 = makeType('int', 16);
export const U32 = makeType('uint', 32);
export const S32 = makeType('int', 32);
export const U64 = makeType('uint', 64);
export const S64 = makeType('int', 64);

export const INT_TYPES: Readonly<Record<IntTypeName, IntType>> = {
    u8: U8,
    s8: S8,
    u16: U16,
    s16: S16,
    u32: U32,
    s32: S32,
    u64: U64,
    s64: S64,
};

export const ALL_INT_TYPES: readonly IntType[] = [U8, S8, U16, S16, U32, S32, U64, S64];

export function isIntTypeName(name: string): name is IntTypeName {
    return Object.prototype.hasOwnProperty.call(INT_TYPES, name);
}

/**
 * Resolves a type marker such as `u16` or `s64`. Returns undefined for
 * anything outside the eight supported markers.
 */
export function parseTypeName(name: string): IntType | undefined {
    const trimmed = name.trim().toLowerCase();
    return isIntTypeName(trimmed) ? INT_TYPES[trimmed] : undefined;
}

export function isSigned(type: IntType): boolean {
    return type.kind === 'int';
}

export function sameType(a: IntType, b: IntType): boolean {
    return a.kind === b.kind && a.bits === b.bits;
}

export function minOf(type: IntType): bigint {
    return type.kind === 'int' ? -(1n << BigInt(type.bits - 1)) : 0n;
}

export function maxOf(type: IntType): bigint {
    return type.kind === 'int'
        ? (1n << BigInt(type.bits - 1)) - 1n
        : (1n << BigInt(type.bits)) - 1n;
}

export function fitsType(value: bigint, type: IntType): boolean {
    return value >= minOf(type) && value <= maxOf(type);
}

function maskToBits(value: bigint, bits: number): bigint {
    const mask = (1n << BigInt(bits)) - 1n;
    return value & mask;
}

function normalizeSigned(value: bigint, bits: number): bigint {
    const masked = maskToBits(value, bits);
    const signBit = 1n << BigInt(bits - 1);
    return (masked & signBit) !== 0n ? masked - (1n << BigInt(bits)) : masked;
}

/** Two's-complement truncation into `type`, as a C cast would do. */
export function normalizeToType(value: bigint, type: IntType): bigint {
    return type.kind === 'uint' ? maskToBits(value, type.bits) : normalizeSigned(value, type.bits);
}

export function convertToType(value: IntValue, target: IntType): IntValue {
    return { type: target, value: normalizeToType(value.value, target) };
}

// numbers past 2^53 may already be rounded; such magnitudes must come as bigint
function toBigIntExact(raw: number | bigint): bigint | undefined {
    if (typeof raw === 'bigint') {
        return raw;
    }
    return Number.isSafeInteger(raw) ? BigInt(raw) : undefined;
}

/**
 * Non-throwing constructor: undefined unless `raw` is an integer inside `type`.
 * `number` inputs must be safe integers.
 */
export function tryIntValue(type: IntType, raw: number | bigint): IntValue | undefined {
    const value = toBigIntExact(raw);
    if (value === undefined || !fitsType(value, type)) {
        return undefined;
    }
    return { type, value };
}

export function intValue(type: IntType, raw: number | bigint): IntValue {
    const out = tryIntValue(type, raw);
    if (!out) {
        throw new RangeError(`${String(raw)} is not a valid ${type.name} value`);
    }
    return out;
}

export const u8 = (raw: number | bigint): IntValue => intValue(U8, raw);
export const s8 = (raw: number | bigint): IntValue => intValue(S8, raw);
export const u16 = (raw: number | bigint): IntValue => intValue(U16, raw);
export const s16 = (raw: number | bigint): IntValue => intValue(S16, raw);
export const u32 = (raw: number | bigint): IntValue => intValue(U32, raw);
export const s32 = (raw: number | bigint): IntValue => intValue(S32, raw);
export const u64 = (raw: number | bigint): IntValue => intValue(U64, raw);
export const s64 = (raw: number | bigint): IntValue => intValue(S64, raw);

export function formatIntValue(value: IntValue): string {
    return `${value.type.name}(${value.value})`;
}
