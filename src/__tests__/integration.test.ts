// ─────────────────────────────────────────────────────────────
// Proofscope  ·  End-to-End Pipeline Tests
// ─────────────────────────────────────────────────────────────

import { describe, it, expect } from 'vitest';
import { EmptyInputError } from '../core/errors';
import type { Logger } from '../core/log';
import { isAcyclic } from '../engine/graph';
import { analyzeProof, serializeResult } from '../engine/pipeline';
import { quietLogger } from './helpers';

const GROUP_PROOF = 'Let G be a finite group. Assume G is abelian. Then every subgroup of G is normal.';

const analyze = (source: string) => analyzeProof(source, { logger: quietLogger });

describe('analyzeProof', () => {
    describe('finite abelian group', () => {
        const result = analyze(GROUP_PROOF);

        it('segments one step per sentence', () => {
            expect(result.steps.map(s => [s.id, s.kind, s.text])).toEqual([
                ['S1', 'claim', 'Let G be a finite group.'],
                ['S2', 'claim', 'Assume G is abelian.'],
                ['S3', 'deduction', 'Then every subgroup of G is normal.'],
            ]);
        });

        it('finds two global assumptions', () => {
            expect(result.assumptions.map(a => [a.id, a.text, a.scopeKind, a.scope])).toEqual([
                ['A1', 'G be a finite group', 'global', ['S1', 'S2', 'S3']],
                ['A2', 'G is abelian', 'global', ['S2', 'S3']],
            ]);
        });

        it('flags only the unassumed property "normal"', () => {
            expect(result.flags).toEqual([
                {
                    id: 'F1',
                    kind: 'unassumed-property',
                    target: 'S3',
                    severity: 'low',
                    message: 'Property "normal" of G is used but no active assumption states it',
                    suggestion: 'State the assumption that G is normal, or cite the result establishing it.',
                },
            ]);
        });

        it('links assumptions to every step that uses G', () => {
            expect(result.graph.edges.map(e => `${e.source}->${e.target}:${e.weight}`)).toEqual([
                'A1->S1:1',
                'A1->S2:1',
                'A1->S3:1',
                'S1->S2:0.1',
                'A2->S2:1',
                'A2->S3:1',
                'S2->S3:0.1',
            ]);
            expect(isAcyclic(result.graph)).toBe(true);
        });

        it('registers G as introduced', () => {
            expect(result.tokens.map(t => [t.symbol, t.occurrences.length, t.introduced])).toEqual([['G', 3, true]]);
        });

        it('produces no warnings', () => {
            expect(result.warnings).toEqual([]);
        });
    });

    describe('citations', () => {
        it('accepts "By Lemma 3.2"', () => {
            const result = analyze('By Lemma 3.2, f is continuous.');
            expect(result.flags.filter(f => f.kind === 'uncited-theorem')).toEqual([]);
            expect(result.steps[0].kind).toBe('application');
        });

        it('flags "By the lemma"', () => {
            const result = analyze('By the lemma, f is continuous.');
            expect(result.flags.filter(f => f.kind === 'uncited-theorem').map(f => f.target)).toEqual(['S1']);
        });
    });

    describe('hedging', () => {
        it('accepts "Clearly, x = 1."', () => {
            expect(analyze('Clearly, x = 1.').flags).toEqual([]);
        });

        it('flags a hedge over a long claim', () => {
            const result = analyze(
                'Clearly, the integral of the product of three oscillating kernels over the compactified domain vanishes.',
            );
            expect(result.flags.map(f => f.kind)).toEqual(['obvious-leap']);
        });
    });

    describe('input errors', () => {
        it('throws EmptyInputError on the empty string', () => {
            expect(() => analyze('')).toThrow(EmptyInputError);
        });

        it('returns a result with warnings for malformed math', () => {
            const seen: string[] = [];
            const logger: Logger = { warn: message => { seen.push(message); }, debug: () => {} };
            const result = analyzeProof('Let $x be real.', { logger });
            expect(result.steps).toHaveLength(1);
            expect(result.warnings).toEqual([
                { code: 'unbalanced-math', message: 'Unclosed $ at offset 4', location: '4' },
            ]);
            expect(seen).toEqual(['[Preprocess] Unclosed $ at offset 4']);
        });

        it('stays quiet at the silent level', () => {
            const seen: string[] = [];
            const logger: Logger = { warn: message => { seen.push(message); }, debug: () => {} };
            analyzeProof('Let $x be real.', { logger, logLevel: 'silent' });
            expect(seen).toEqual([]);
        });
    });

    describe('invariants', () => {
        const proof = 'Let $f \\colon \\R \\to \\R$ be continuous, i.e. nice. Suppose for contradiction that '
            + '$f(0) \\neq 0$. Case 1: $f(0) > 0$. Then by the lemma, $f > 0$ near $0$. This completes Case 1. '
            + 'Case 2: $f(0) < 0$. Clearly $f < 0$ near $0$. This is a contradiction. Hence $f(0) = 0$.';

        it('reconstructs the normalized text from the steps', () => {
            for (const minStepLength of [0, 40, 200]) {
                const result = analyzeProof(proof, { minStepLength, logger: quietLogger });
                expect(result.steps.map(s => s.text).join(' ')).toBe(result.normalized);
            }
        });

        it('keeps the graph acyclic with forward edges', () => {
            const result = analyze(proof);
            const position = new Map(result.graph.nodes.map((n, i): [string, number] => [n.id, i]));
            expect(result.graph.edges.every(e => (position.get(e.source) ?? 0) < (position.get(e.target) ?? 0))).toBe(true);
            expect(isAcyclic(result.graph)).toBe(true);
        });

        it('is deterministic across runs', () => {
            expect(analyze(proof)).toEqual(analyze(proof));
        });

        it('returns a frozen result', () => {
            const result = analyze(GROUP_PROOF);
            expect(Object.isFrozen(result)).toBe(true);
            expect(Object.isFrozen(result.steps[0])).toBe(true);
            expect(Object.isFrozen(result.assumptions[0].scope)).toBe(true);
        });
    });
});

describe('serializeResult', () => {
    const serialized = serializeResult(analyze(GROUP_PROOF));

    it('uses the documented keys', () => {
        expect(Object.keys(serialized)).toEqual(['steps', 'assumptions', 'flags', 'graph', 'warnings']);
        expect(Object.keys(serialized.steps[0])).toEqual(['id', 'text', 'kind', 'tokens', 'citations', 'keywords']);
        expect(Object.keys(serialized.flags[0])).toEqual(['id', 'kind', 'target', 'message', 'severity', 'suggestion']);
    });

    it('maps assumptions to plain records', () => {
        expect(serialized.assumptions[0]).toEqual({
            id: 'A1',
            text: 'G be a finite group',
            keyword: 'Let',
            scope_kind: 'global',
            scope_step_ids: ['S1', 'S2', 'S3'],
            step_id: 'S1',
            tokens: ['G'],
            properties: ['finite'],
        });
    });

    it('lists graph nodes by id', () => {
        expect(serialized.graph.nodes).toEqual(['A1', 'S1', 'A2', 'S2', 'S3']);
        expect(serialized.graph.edges[0]).toEqual({ source: 'A1', target: 'S1', weight: 1 });
    });

    it('survives a JSON round trip', () => {
        expect(JSON.parse(JSON.stringify(serialized))).toEqual(serialized);
    });
});
