// ─────────────────────────────────────────────────────────────
// Proofscope  ·  Gap Detector Tests
// ─────────────────────────────────────────────────────────────

import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG } from '../core/config';
import { PROPERTY_VOCABULARY } from '../core/vocabulary';
import {
    detectGaps,
    detectObviousLeaps,
    detectUnassumedProperties,
    detectUncitedTheorems,
    detectUndefinedSymbols,
    measureHedgedContent,
    type GapInput,
} from '../engine/gaps';
import { extractAssumptions } from '../parser/assumptions';
import { TokenRegistry } from '../parser/tokens';
import { quietDiagnostics, stepsOf } from './helpers';

function inputOf(source: string, minStepLength = 0): GapInput {
    const steps = stepsOf(source, minStepLength);
    const registry = new TokenRegistry();
    for (const step of steps) registry.record(step.id, step.text);
    return {
        steps,
        assumptions: extractAssumptions(steps, PROPERTY_VOCABULARY, quietDiagnostics()),
        tokens: registry.tokens(),
    };
}

describe('detectUndefinedSymbols', () => {
    it('flags a repeated symbol that is never introduced', () => {
        const flags = detectUndefinedSymbols(inputOf('Then $f(x) = 0$. So $f$ is zero.'), DEFAULT_CONFIG);
        expect(flags).toEqual([
            {
                kind: 'undefined-symbol',
                target: 'S1',
                severity: 'medium',
                message: 'Symbol f is used 2 times but never introduced',
                suggestion: 'Introduce f with "Let", "Fix" or "Define" before its first use.',
            },
        ]);
    });

    it('counts juxtaposed letters separately', () => {
        const flags = detectUndefinedSymbols(inputOf('Let $G$ be a group. Then $gh = hg$.'), DEFAULT_CONFIG);
        expect(flags.map(f => [f.target, f.message])).toEqual([
            ['S2', 'Symbol g is used 2 times but never introduced'],
            ['S2', 'Symbol h is used 2 times but never introduced'],
        ]);
    });

    it('skips introduced symbols', () => {
        expect(detectUndefinedSymbols(inputOf('Let $f = 0$. So $f$ is zero.'), DEFAULT_CONFIG)).toEqual([]);
    });

    it('skips whitelisted constants', () => {
        expect(detectUndefinedSymbols(inputOf('Then $e > 1$. So $e^2 > 1$.'), DEFAULT_CONFIG)).toEqual([]);
    });
});

describe('detectUncitedTheorems', () => {
    const uncited = (source: string) =>
        detectUncitedTheorems(inputOf(source), DEFAULT_CONFIG).map(f => f.message);

    it('accepts a numbered reference', () => {
        expect(uncited('By Lemma 3.2, $f$ is continuous.')).toEqual([]);
    });

    it('accepts a \\ref after a tie', () => {
        expect(uncited('By Theorem~\\ref{thm:main}, we are done.')).toEqual([]);
    });

    it('flags a bare "by the lemma"', () => {
        expect(uncited('By the lemma, $f$ is continuous.')).toEqual(['"By the lemma" does not say which result is applied']);
    });

    it('flags a reference later in the sentence', () => {
        expect(uncited('This follows by the previous theorem.')).toEqual([
            '"by the previous theorem" does not say which result is applied',
        ]);
    });

    it('flags a result named only by position', () => {
        expect(uncited('By the above lemma, $f$ is continuous. By the above, $g$ is too.')).toEqual([
            '"By the above lemma" does not say which result is applied',
        ]);
    });

    it('ignores standard phrases', () => {
        expect(uncited("By definition, $x > 0$. By the theorem's hypothesis, $y > 0$.")).toEqual([]);
    });
});

describe('detectUnassumedProperties', () => {
    it('passes when an active assumption states the property for the symbol', () => {
        const flags = detectUnassumedProperties(inputOf('Let $f$ be continuous. Then $f$ is continuous at $0$.'), DEFAULT_CONFIG);
        expect(flags).toEqual([]);
    });

    it('flags the property for a different symbol', () => {
        const flags = detectUnassumedProperties(inputOf('Let $f$ be continuous. Then $g$ is continuous.'), DEFAULT_CONFIG);
        expect(flags.map(f => [f.target, f.message])).toEqual([
            ['S2', 'Property "continuous" of g is used but no active assumption states it'],
        ]);
    });

    it('flags each property and symbol pair once', () => {
        const flags = detectUnassumedProperties(
            inputOf('Then $K$ is compact. Hence $K$ is compact and bounded.'),
            DEFAULT_CONFIG,
        );
        expect(flags.map(f => [f.target, f.message])).toEqual([
            ['S1', 'Property "compact" of K is used but no active assumption states it'],
            ['S2', 'Property "bounded" of K is used but no active assumption states it'],
        ]);
    });

    it('honours a custom vocabulary', () => {
        const input = inputOf('Then $K$ is compact.');
        expect(detectUnassumedProperties(input, { ...DEFAULT_CONFIG, vocabulary: ['bounded'] })).toEqual([]);
    });
});

describe('detectObviousLeaps', () => {
    it('measures the rest of the hedged sentence', () => {
        expect(measureHedgedContent('Clearly, x = 1.', 7)).toEqual({ operators: 1, mathLength: 0, textLength: 5 });
    });

    it('accepts a simple hedged claim', () => {
        expect(detectObviousLeaps(inputOf('Clearly, x = 1.'), DEFAULT_CONFIG)).toEqual([]);
    });

    it('flags a hedge in front of a long claim', () => {
        const flags = detectObviousLeaps(
            inputOf('Clearly, the integral of the product of three oscillating kernels over the compactified domain vanishes.'),
            DEFAULT_CONFIG,
        );
        expect(flags).toEqual([
            {
                kind: 'obvious-leap',
                target: 'S1',
                severity: 'low',
                message: '"Clearly" introduces non-trivial content (94 chars of prose)',
                suggestion: 'Spell out the intermediate reasoning instead of calling it obvious.',
            },
        ]);
    });

    it('raises severity when several cutoffs are exceeded', () => {
        const flags = detectObviousLeaps(
            inputOf('Clearly $\\sum_{k=1}^{n} k^2 = \\frac{n(n+1)(2n+1)}{6}$.'),
            DEFAULT_CONFIG,
        );
        expect(flags.map(f => [f.severity, f.message])).toEqual([
            ['medium', '"Clearly" introduces non-trivial content (8 operators, 45 chars of math)'],
        ]);
    });

    it('follows configured cutoffs', () => {
        const flags = detectObviousLeaps(inputOf('Clearly, x = 1.'), {
            ...DEFAULT_CONFIG,
            obviousLeap: { maxOperators: 0, maxMathLength: 40, maxTextLength: 60 },
        });
        expect(flags.map(f => f.message)).toEqual(['"Clearly" introduces non-trivial content (1 operators)']);
    });
});

describe('detectGaps', () => {
    const source = 'Then $f(x) = 0$. By the lemma, $g$ is compact. Clearly, the integral of the product of three '
        + 'oscillating kernels over the compactified domain vanishes. So $f$ is zero.';

    it('groups flags by kind and numbers them in order', () => {
        const flags = detectGaps(inputOf(source), DEFAULT_CONFIG);
        expect(flags.map(f => [f.id, f.kind, f.target])).toEqual([
            ['F1', 'undefined-symbol', 'S1'],
            ['F2', 'uncited-theorem', 'S2'],
            ['F3', 'unassumed-property', 'S2'],
            ['F4', 'obvious-leap', 'S3'],
        ]);
    });

    it('is deterministic', () => {
        const input = inputOf(source);
        expect(detectGaps(input, DEFAULT_CONFIG)).toEqual(detectGaps(input, DEFAULT_CONFIG));
    });
});
