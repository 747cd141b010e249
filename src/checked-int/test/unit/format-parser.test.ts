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

import { FormatParser, operandCount, parseFormat, type FormatProgram } from '../../format-parser';
import { S16, S32, U16, U64, U8 } from '../../int-types';

function programOf(source: string): FormatProgram {
    const result = parseFormat(source);
    if (!result.program) {
        throw new Error(`Expected '${source}' to parse: ${result.diagnostics.map(d => d.message).join('; ')}`);
    }
    return result.program;
}

function firstError(source: string): string | undefined {
    const result = parseFormat(source);
    expect(result.program).toBeUndefined();
    return result.diagnostics[0]?.message;
}

describe('FormatParser', () => {
    it('applies the leading type to every unmarked operand', () => {
        const program = programOf('u16**+');
        expect(program.leadingType).toBe(U16);
        expect(program.leadingExplicit).toBe(true);
        expect(program.steps).toEqual([
            { op: 'mul', symbol: '*', rhsType: U16, explicitType: false, start: 3, end: 4 },
            { op: 'mul', symbol: '*', rhsType: U16, explicitType: false, start: 4, end: 5 },
            { op: 'add', symbol: '+', rhsType: U16, explicitType: false, start: 5, end: 6 },
        ]);
        expect(operandCount(program)).toBe(4);
    });

    it('ignores whitespace between tokens', () => {
        const program = programOf(' u8 + s16 - ');
        expect(program.leadingType).toBe(U8);
        expect(program.steps).toEqual([
            { op: 'add', symbol: '+', rhsType: S16, explicitType: true, start: 4, end: 9 },
            { op: 'sub', symbol: '-', rhsType: U8, explicitType: false, start: 10, end: 11 },
        ]);
    });

    it('defaults the leading type to s32', () => {
        const program = programOf('*<<>>u64');
        expect(program.leadingType).toBe(S32);
        expect(program.leadingExplicit).toBe(false);
        expect(program.steps.map(s => [s.op, s.rhsType.name])).toEqual([
            ['mul', 's32'],
            ['shl', 's32'],
            ['shr', 'u64'],
        ]);
        expect(program.steps[2]).toMatchObject({ start: 3, end: 8, explicitType: true });
    });

    it('uses a configured default type', () => {
        const result = new FormatParser(U8).parse('+/');
        expect(result.program?.leadingType).toBe(U8);
        expect(result.program?.steps.map(s => s.rhsType)).toEqual([U8, U8]);
        expect(result.diagnostics).toEqual([]);
    });

    it('accepts upper-case type markers', () => {
        const program = programOf('U8+S16');
        expect(program.leadingType).toBe(U8);
        expect(program.steps).toEqual([
            { op: 'add', symbol: '+', rhsType: S16, explicitType: true, start: 2, end: 6 },
        ]);
        expect(firstError('U7+')).toBe('Unknown type marker \'U7\' at 0');
    });

    it('reads every operator', () => {
        const program = programOf('s64+-*/%<<>>');
        expect(program.steps.map(s => s.symbol)).toEqual(['+', '-', '*', '/', '%', '<<', '>>']);
        expect(program.steps.map(s => s.op)).toEqual(['add', 'sub', 'mul', 'div', 'mod', 'shl', 'shr']);
    });

    it('accepts adjacent operators without markers', () => {
        const program = programOf('u8++s8');
        expect(program.steps.map(s => s.rhsType.name)).toEqual(['u8', 's8']);
    });

    it('keeps the source text', () => {
        expect(programOf('u32*u32').source).toBe('u32*u32');
    });

    it('reports an empty program', () => {
        expect(parseFormat('')).toEqual({ diagnostics: [{ type: 'error', message: 'Empty format program', start: 0, end: 0 }] });
        expect(firstError('   ')).toBe('Empty format program');
    });

    it('reports a program without operations', () => {
        expect(parseFormat('u32').diagnostics).toEqual([{ type: 'error', message: 'Format program has no operations', start: 3, end: 3 }]);
    });

    it('reports malformed type markers', () => {
        expect(parseFormat('u7+').diagnostics).toEqual([{ type: 'error', message: 'Unknown type marker \'u7\' at 0', start: 0, end: 2 }]);
        expect(firstError('+u')).toBe('Unknown type marker \'u\' at 1');
        expect(firstError('s32+s128')).toBe('Unknown type marker \'s128\' at 4');
    });

    it('reports incomplete shift operators', () => {
        expect(firstError('u8 < u8')).toBe('Incomplete operator \'<\' at 3');
        expect(firstError('+>')).toBe('Incomplete operator \'>\' at 1');
    });

    it('reports a type marker where an operator is expected', () => {
        expect(firstError('u32u8+')).toBe('Expected operator, found \'u8\' at 3');
    });

    it('reports unknown characters', () => {
        expect(firstError('u8+x')).toBe('Unexpected character \'x\' at 3');
        expect(firstError('&')).toBe('Unexpected character \'&\' at 0');
    });

    it('can be reused across programs', () => {
        const parser = new FormatParser();
        expect(parser.parse('u8+x').program).toBeUndefined();
        const ok = parser.parse('u8+');
        expect(ok.diagnostics).toEqual([]);
        expect(ok.program?.steps).toHaveLength(1);
    });
});
