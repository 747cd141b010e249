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

import { EvaluatorDiagnostics } from '../../evaluator-diagnostics';
import type { FormatStep } from '../../format-parser';
import { S8, U32, U8, s8, u32, u8 } from '../../int-types';

const step = (symbol: FormatStep['symbol'], op: FormatStep['op'], rhsType = U8): FormatStep => ({
    op,
    symbol,
    rhsType,
    explicitType: true,
    start: 0,
    end: 0,
});

describe('EvaluatorDiagnostics', () => {
    it('records, resets, and exposes messages', () => {
        const diag = new EvaluatorDiagnostics();
        expect(diag.getMessages()).toBe('');

        diag.record('a');
        diag.record('b');
        expect(diag.getMessages()).toBe('a\nb');

        diag.reset();
        expect(diag.getMessages()).toBe('');
    });

    it('records parse diagnostics by message', () => {
        const diag = new EvaluatorDiagnostics();
        diag.recordParseDiagnostics([
            { type: 'error', message: 'first', start: 0, end: 1 },
            { type: 'error', message: 'second', start: 1, end: 2 },
        ]);
        expect(diag.getMessages()).toBe('first\nsecond');
    });

    it('formats operands for messages', () => {
        const diag = new EvaluatorDiagnostics();
        expect(diag.formatOperandForMessage(5)).toBe('5');
        expect(diag.formatOperandForMessage(-1.5)).toBe('-1.5');
        expect(diag.formatOperandForMessage(300n)).toBe('300n');
        expect(diag.formatOperandRange(1, 256, U8)).toBe('Operand 2 (256) is not a valid u8');
    });

    it('formats step failures by reason', () => {
        const diag = new EvaluatorDiagnostics();
        expect(diag.formatStepFailure(0, step('+', 'add'), 'overflow', u8(250), u8(10)))
            .toBe('Step 1 (+) failed: overflow in u8(250) + u8(10)');
        expect(diag.formatStepFailure(2, step('+', 'add', S8), 'cast', u8(10), s8(-3)))
            .toBe('Step 3 (+) failed: cannot represent s8(-3) as u8');
        expect(diag.formatStepFailure(1, step('%', 'mod', U32), 'division', u32(7), u32(0)))
            .toBe('Step 2 (%) failed: invalid divisor in u32(7) % u32(0)');
        expect(diag.formatStepFailure(0, step('<<', 'shl', U32), 'shift', u32(1), u32(32)))
            .toBe('Step 1 (<<) failed: invalid shift in u32(1) << u32(32)');
    });
});
