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

import { S32, parseTypeName, type IntType } from './int-types';
import { SYMBOL_OPS, type OpKind, type OpSymbol } from './primitive-checks';

export interface FormatStep {
    op: OpKind;
    symbol: OpSymbol;
    rhsType: IntType;
    // false when the step inherited the leading type
    explicitType: boolean;
    start: number;
    end: number;
}

export interface FormatProgram {
    source: string;
    leadingType: IntType;
    leadingExplicit: boolean;
    steps: FormatStep[];
}

export interface Diagnostic { type: 'error'|'warning'|'info'; message: string; start: number; end: number; }

export interface FormatParseResult {
    program?: FormatProgram;
    diagnostics: Diagnostic[];
}

export function operandCount(program: FormatProgram): number {
    return program.steps.length + 1;
}

/* ---------------- Tokenizer ---------------- */

type TokenKind = 'EOF'|'TYPE'|'OP'|'BAD_TYPE'|'UNKNOWN';
interface Token { kind: TokenKind; value: string; start: number; end: number; }

// keep longer tokens before shorter ones
const MULTI = ['<<', '>>'] as const;

const SINGLE = new Set('+-*/%'.split(''));

class Tokenizer {
    private s: string = '';
    private i = 0;
    private n = 0;
    constructor(s: string) {
        this.reset(s);
    }
    public reset(s: string) {
        this.s = s;
        this.i = 0;
        this.n = s.length;
    }
    public eof() {
        return this.i >= this.n;
    }
    public peek(k=0) {
        const j = this.i + k;
        return j < this.n ? this.s.charAt(j) : '';
    }
    public advance(k=1) {
        this.i += k;
    }
    public skipWS() {
        while (!this.eof() && /\s/.test(this.s.charAt(this.i))) {
            this.i++;
        }
    }
    public next(): Token {
        this.skipWS();
        if (this.eof()) {
            return { kind:'EOF', value:'', start:this.i, end:this.i };
        }

        for (const m of MULTI) {
            if (this.s.startsWith(m, this.i)) {
                const start = this.i; this.advance(m.length);
                return { kind:'OP', value:m, start, end:this.i };
            }
        }

        const ch = this.peek(0);

        if (/[usUS]/.test(ch)) {
            const start = this.i;
            this.advance();
            while (!this.eof() && /[0-9]/.test(this.peek())) {
                this.advance();
            }
            const raw = this.s.slice(start, this.i);
            return { kind: parseTypeName(raw) ? 'TYPE' : 'BAD_TYPE', value:raw, start, end:this.i };
        }

        if (SINGLE.has(ch)) {
            const start = this.i;
            this.advance();
            return { kind:'OP', value:ch, start, end:this.i };
        }

        const start = this.i;
        this.advance();
        return { kind:'UNKNOWN', value:ch, start, end:this.i };
    }
}

/* ---------------- Parser ---------------- */

function isOpSymbol(value: string): value is OpSymbol {
    return Object.prototype.hasOwnProperty.call(SYMBOL_OPS, value);
}

export class FormatParser {
    private tokenizer = new Tokenizer('');
    private cur: Token = { kind:'EOF', value:'', start:0, end:0 };
    private diagnostics: Diagnostic[] = [];

    constructor(private readonly defaultType: IntType = S32) {}

    private reset(input: string) {
        this.tokenizer.reset(input);
        this.diagnostics = [];
        this.cur = this.tokenizer.next();
    }

    private eat() {
        this.cur = this.tokenizer.next();
    }

    private error(message: string, token: Token) {
        this.diagnostics.push({ type:'error', message, start:token.start, end:token.end });
    }

    private reportUnexpected(token: Token) {
        if (token.kind === 'BAD_TYPE') {
            this.error(`Unknown type marker '${token.value}' at ${token.start}`, token);
        } else if (token.value === '<' || token.value === '>') {
            this.error(`Incomplete operator '${token.value}' at ${token.start}`, token);
        } else if (token.kind === 'TYPE') {
            this.error(`Expected operator, found '${token.value}' at ${token.start}`, token);
        } else {
            this.error(`Unexpected character '${token.value}' at ${token.start}`, token);
        }
    }

    /** Reads an optional type marker; undefined when absent, null when malformed. */
    private readType(): IntType | undefined | null {
        if (this.cur.kind === 'BAD_TYPE') {
            this.reportUnexpected(this.cur);
            return null;
        }
        if (this.cur.kind !== 'TYPE') {
            return undefined;
        }
        const type = parseTypeName(this.cur.value) ?? null;
        this.eat();
        return type;
    }

    public parse(source: string): FormatParseResult {
        this.reset(source);
        const first = this.cur;
        if (first.kind === 'EOF') {
            this.error('Empty format program', first);
            return { diagnostics: this.diagnostics };
        }

        const leading = this.readType();
        if (leading === null) {
            return { diagnostics: this.diagnostics };
        }
        const leadingType = leading ?? this.defaultType;
        const steps: FormatStep[] = [];

        while (this.cur.kind !== 'EOF') {
            const opToken = this.cur;
            const symbol = opToken.value;
            if (opToken.kind !== 'OP' || !isOpSymbol(symbol)) {
                this.reportUnexpected(opToken);
                return { diagnostics: this.diagnostics };
            }
            this.eat();
            const typeToken = this.cur;
            const rhs = this.readType();
            if (rhs === null) {
                return { diagnostics: this.diagnostics };
            }
            steps.push({
                op: SYMBOL_OPS[symbol],
                symbol,
                rhsType: rhs ?? leadingType,
                explicitType: rhs !== undefined,
                start: opToken.start,
                end: rhs !== undefined ? typeToken.end : opToken.end,
            });
        }

        if (steps.length === 0) {
            this.error('Format program has no operations', this.cur);
            return { diagnostics: this.diagnostics };
        }

        return {
            program: { source, leadingType, leadingExplicit: leading !== undefined, steps },
            diagnostics: this.diagnostics,
        };
    }
}

export function parseFormat(source: string, defaultType: IntType = S32): FormatParseResult {
    return new FormatParser(defaultType).parse(source);
}
