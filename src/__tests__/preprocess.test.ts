// ─────────────────────────────────────────────────────────────
// Proofscope  ·  Preprocessor Tests
// ─────────────────────────────────────────────────────────────

import { describe, it, expect } from 'vitest';
import { EmptyInputError } from '../core/errors';
import { expandMacros, findMathRanges, preprocess, stripComments } from '../parser/preprocess';
import { quietDiagnostics } from './helpers';

describe('preprocess', () => {
    describe('normalization', () => {
        it('strips comments and collapses whitespace', () => {
            const pre = preprocess('Let $x$ be real. % note\nThen   $x^2 \\ge 0$.');
            expect(pre.text).toBe('Let $x$ be real. Then $x^2 \\ge 0$.');
        });

        it('keeps escaped percent signs', () => {
            expect(stripComments('50\\% of cases')).toBe('50\\% of cases');
        });

        it('expands the macro table', () => {
            expect(expandMacros('$x \\in \\R$')).toBe('$x \\in \\mathbb{R}$');
            expect(expandMacros('$\\eps > 0$')).toBe('$\\varepsilon > 0$');
        });

        it('leaves longer commands with a macro prefix alone', () => {
            expect(expandMacros('\\label{a} \\Rightarrow')).toBe('\\label{a} \\Rightarrow');
        });

        it('removes proof environment wrappers', () => {
            const pre = preprocess('\\begin{proof} Let $x = 1$. \\end{proof}');
            expect(pre.text).toBe('Let $x = 1$.');
        });

        it('keeps the raw source', () => {
            const raw = '  Let $x$ be real.  ';
            expect(preprocess(raw).source).toBe(raw);
        });
    });

    describe('empty input', () => {
        it('rejects the empty string', () => {
            expect(() => preprocess('')).toThrow(EmptyInputError);
        });

        it('rejects whitespace-only input', () => {
            expect(() => preprocess('  \n\t ')).toThrow(EmptyInputError);
        });

        it('rejects input that is only a comment', () => {
            expect(() => preprocess('% just a note')).toThrow('Proof text is empty after removing comments');
        });
    });

    describe('protected ranges', () => {
        it('finds inline math with dollars', () => {
            expect(findMathRanges('so $x$ holds')).toEqual([{ start: 3, end: 6 }]);
        });

        it('ignores escaped dollars', () => {
            expect(findMathRanges('a \\$5 and $x$')).toEqual([{ start: 10, end: 13 }]);
        });

        it('finds display math and environments', () => {
            expect(findMathRanges('\\[ x \\]')).toEqual([{ start: 0, end: 7 }]);
            const env = '\\begin{align} a \\end{align}';
            expect(findMathRanges(env)).toEqual([{ start: 0, end: env.length }]);
        });

        it('finds double-dollar display math as one span', () => {
            expect(findMathRanges('$$a$$ b')).toEqual([{ start: 0, end: 5 }]);
        });

        it('reports an unclosed dollar and leaves the rest unprotected', () => {
            const diagnostics = quietDiagnostics();
            const pre = preprocess('Let $x be real.', diagnostics);
            expect(pre.protectedRanges).toEqual([]);
            expect(diagnostics.warnings).toEqual([
                { code: 'unbalanced-math', message: 'Unclosed $ at offset 4', location: '4' },
            ]);
        });

        it('reports an unclosed environment', () => {
            const diagnostics = quietDiagnostics();
            preprocess('We have \\begin{align} x = 1.', diagnostics);
            expect(diagnostics.warnings.map(w => w.code)).toEqual(['unbalanced-environment']);
        });
    });
});
