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

import type { FailureReason } from './dispatch';
import { formatIntValue, type IntType, type IntValue } from './int-types';
import type { Diagnostic, FormatStep } from './format-parser';

export class EvaluatorDiagnostics {
    private readonly messages: string[] = [];

    public reset(): void {
        this.messages.length = 0;
    }

    public record(message: string): void {
        this.messages.push(message);
    }

    public recordParseDiagnostics(diagnostics: readonly Diagnostic[]): void {
        for (const diagnostic of diagnostics) {
            this.record(diagnostic.message);
        }
    }

    public getMessages(): string {
        return this.messages.join('\n');
    }

    public formatOperandForMessage(raw: number | bigint): string {
        return typeof raw === 'bigint' ? `${raw}n` : String(raw);
    }

    public formatStepFailure(index: number, step: FormatStep, reason: FailureReason, left: IntValue, right: IntValue): string {
        const lhs = formatIntValue(left);
        const rhs = formatIntValue(right);
        const prefix = `Step ${index + 1} (${step.symbol}) failed`;
        switch (reason) {
            case 'cast':
                return `${prefix}: cannot represent ${rhs} as ${left.type.name}`;
            case 'division':
                return `${prefix}: invalid divisor in ${lhs} ${step.symbol} ${rhs}`;
            case 'shift':
                return `${prefix}: invalid shift in ${lhs} ${step.symbol} ${rhs}`;
            default:
                return `${prefix}: overflow in ${lhs} ${step.symbol} ${rhs}`;
        }
    }

    public formatOperandRange(index: number, raw: number | bigint, type: IntType): string {
        return `Operand ${index + 1} (${this.formatOperandForMessage(raw)}) is not a valid ${type.name}`;
    }
}
