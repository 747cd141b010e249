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
 * Evaluates format programs such as `u16**+`: a leading type marker followed
 * by operator/type pairs, folded strictly left to right over the operands.
 * `evaluate(out, 'u16**+', a, b, c, d)` computes `((a * b) * c) + d` in u16.
 */

import { logger } from '../logger';
import { getActiveSettings } from '../config/settings';
import { applyBinaryOp, type FailureReason } from './dispatch';
import { EvaluatorDiagnostics } from './evaluator-diagnostics';
import { FormatParser, operandCount, type FormatProgram } from './format-parser';
import {
    INT_TYPES,
    normalizeToType,
    tryIntValue,
    type IntType,
    type IntTypeName,
    type IntValue,
    type ValueSlot,
} from './int-types';

export type Operand = number | bigint;

export type EvaluationOutcome =
    | { ok: true; value: IntValue }
    | { ok: false; reason: FailureReason; message: string; step?: number };

export interface FormatEvaluatorOptions {
    defaultType?: IntTypeName;
    logFailures?: boolean;
}

export class FormatEvaluator {
    private readonly diagnostics = new EvaluatorDiagnostics();
    private readonly parser: FormatParser;
    private readonly logFailures: boolean;

    constructor(options: FormatEvaluatorOptions = {}) {
        const settings = getActiveSettings();
        this.parser = new FormatParser(INT_TYPES[options.defaultType ?? settings.defaultType]);
        this.logFailures = options.logFailures ?? settings.logFailures;
    }

    public getMessages(): string {
        return this.diagnostics.getMessages();
    }

    public evaluate(source: string, operands: readonly Operand[]): EvaluationOutcome {
        this.diagnostics.reset();
        const parsed = this.parser.parse(source);
        if (!parsed.program) {
            this.diagnostics.recordParseDiagnostics(parsed.diagnostics);
            return this.fail({ ok: false, reason: 'syntax', message: this.getMessages() }, source);
        }
        return this.fold(parsed.program, operands, source);
    }

    public evaluateProgram(program: FormatProgram, operands: readonly Operand[]): EvaluationOutcome {
        this.diagnostics.reset();
        return this.fold(program, operands, program.source);
    }

    private fold(program: FormatProgram, operands: readonly Operand[], source: string): EvaluationOutcome {
        const expected = operandCount(program);
        if (operands.length !== expected) {
            const message = `Expected ${expected} operands, received ${operands.length}`;
            this.diagnostics.record(message);
            return this.fail({ ok: false, reason: 'operand-count', message }, source);
        }

        const seed = this.readOperand(operands, 0, program.leadingType);
        if (!seed) {
            return this.fail({ ok: false, reason: 'operand-range', message: this.getMessages() }, source);
        }

        let acc: IntValue = seed;
        for (const [index, step] of program.steps.entries()) {
            const rhs = this.readOperand(operands, index + 1, step.rhsType);
            if (!rhs) {
                return this.fail({ ok: false, reason: 'operand-range', message: this.getMessages(), step: index + 1 }, source);
            }
            const result = applyBinaryOp(step.op, acc, rhs);
            if (!result.ok) {
                const message = this.diagnostics.formatStepFailure(index, step, result.reason, acc, rhs);
                this.diagnostics.record(message);
                return this.fail({ ok: false, reason: result.reason, message, step: index + 1 }, source);
            }
            acc = result.value;
        }

        return { ok: true, value: { type: acc.type, value: normalizeToType(acc.value, acc.type) } };
    }

    private readOperand(operands: readonly Operand[], index: number, type: IntType): IntValue | undefined {
        const raw = operands[index];
        const value = tryIntValue(type, raw);
        if (!value) {
            this.diagnostics.record(this.diagnostics.formatOperandRange(index, raw, type));
        }
        return value;
    }

    private fail(outcome: Extract<EvaluationOutcome, { ok: false }>, source: string): EvaluationOutcome {
        if (this.logFailures) {
            logger.debug(`Format program '${source}' failed:\n${this.getMessages()}`);
        }
        return outcome;
    }
}

/**
 * Slot form of {@link FormatEvaluator.evaluate}. `out.value` receives the
 * final payload on success and is left as it was on any failure.
 */
export function evaluate(out: ValueSlot<bigint> | undefined, source: string, ...operands: Operand[]): boolean {
    const outcome = new FormatEvaluator().evaluate(source, operands);
    if (!outcome.ok) {
        return false;
    }
    if (out) {
        out.value = outcome.value.value;
    }
    return true;
}
