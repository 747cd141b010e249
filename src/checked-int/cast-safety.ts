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

import { fitsType, isSigned, maxOf, minOf, type IntType, type IntValue } from './int-types';

function castEqualWidth(value: bigint, from: IntType, to: IntType): boolean {
    if (isSigned(from) === isSigned(to)) {
        return true;
    }
    return isSigned(to) ? value <= maxOf(to) : value >= 0n;
}

function castWidening(value: bigint, from: IntType, to: IntType): boolean {
    if (isSigned(from) === isSigned(to)) {
        return true;
    }
    if (!isSigned(to)) {
        return value >= 0n;
    }
    if (maxOf(to) >= maxOf(from)) {
        return true;
    }
    return value <= maxOf(to);
}

function castNarrowing(value: bigint, from: IntType, to: IntType): boolean {
    if (isSigned(to)) {
        return isSigned(from)
            ? value >= minOf(to) && value <= maxOf(to)
            : value <= maxOf(to);
    }
    return isSigned(from)
        ? value >= 0n && value <= maxOf(to)
        : value <= maxOf(to);
}

/**
 * True when `from` denotes the same number once reinterpreted as `to`.
 *
 * The check does not know which operation follows, so it rejects pairs a
 * particular operation could still handle: `u8(10) + s8(-3)` is refused even
 * though `u8(10) - u8(3)` is fine. Callers wanting that result must phrase it
 * as the subtraction.
 *
 * A payload outside its own declared type is never reinterpretable.
 */
export function canReinterpret(from: IntValue, to: IntType): boolean {
    const source = from.type;
    if (!fitsType(from.value, source)) {
        return false;
    }
    if (source.bits === to.bits) {
        return castEqualWidth(from.value, source, to);
    }
    if (to.bits > source.bits) {
        return castWidening(from.value, source, to);
    }
    return castNarrowing(from.value, source, to);
}
