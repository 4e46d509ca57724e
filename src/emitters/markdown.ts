// ─────────────────────────────────────────────────────────────
// Proofscope  ·  Markdown Report
// ─────────────────────────────────────────────────────────────

import type { AnalysisResult, Assumption, Flag, FlagKind, Step } from '../core/types';

const KIND_TITLES: Record<FlagKind, string> = {
    'undefined-symbol': 'Undefined Symbol',
    'uncited-theorem': 'Uncited Theorem',
    'unassumed-property': 'Unassumed Property',
    'obvious-leap': 'Obvious Leap',
};

export function emitMarkdownReport(result: AnalysisResult): string {
    return [
        '## Summary',
        formatSummary(result),
        '',
        '## Steps',
        formatStepsTable(result.steps),
        '',
        '## Assumptions',
        formatAssumptions(result.assumptions),
        '',
        '## Gap Flags',
        formatFlags(result.flags),
        '',
    ].join('\n');
}

export function formatSummary(result: AnalysisResult): string {
    const lines = [
        `- Steps found: ${result.steps.length}`,
        `- Assumptions detected: ${result.assumptions.length}`,
        `- Issues flagged: ${result.flags.length}`,
    ];
    if (result.warnings.length > 0) {
        lines.push(`- Warnings: ${result.warnings.map(w => w.message).join('; ')}`);
    }
    return lines.join('\n');
}

export function formatStepsTable(steps: readonly Step[]): string {
    if (steps.length === 0) return 'No steps found.';

    const lines = ['| Step | Kind | Text | Tokens | Keywords |', '|------|------|------|--------|----------|'];
    for (const s of steps) {
        let preview = s.text.slice(0, 100).replace(/\|/g, '\\|');
        if (s.text.length > 100) preview += '...';

        const symbols = [...new Set(s.tokens.map(t => t.display))];
        let tokens = symbols.slice(0, 5).join(', ');
        if (symbols.length > 5) tokens += ` (+${symbols.length - 5})`;

        lines.push(`| ${s.id} | ${s.kind} | ${preview} | ${tokens} | ${s.keywords.slice(0, 3).join(', ')} |`);
    }
    return lines.join('\n');
}

export function formatAssumptions(assumptions: readonly Assumption[]): string {
    if (assumptions.length === 0) return 'No assumptions detected.';

    const lines: string[] = [];
    for (const a of assumptions) {
        lines.push(`### ${a.id} (${a.scopeKind === 'global' ? 'Global' : 'Local'})`);
        lines.push(`> ${a.text}`);
        if (a.tokens.length > 0) lines.push(`**Entities:** ${a.tokens.slice(0, 5).join(', ')}`);
        if (a.properties.length > 0) lines.push(`**Properties:** ${a.properties.join(', ')}`);
        lines.push(`*Introduced at: ${a.stepId}; active over ${a.scope.join(', ')}*`);
        lines.push('');
    }
    return lines.join('\n').trimEnd();
}

export function formatFlags(flags: readonly Flag[]): string {
    if (flags.length === 0) return 'No issues detected.';

    const lines: string[] = [];
    for (const f of flags) {
        lines.push(`### ${f.id} · ${KIND_TITLES[f.kind]}`);
        lines.push(`**Location:** ${f.target} | **Severity:** ${f.severity.toUpperCase()}`);
        lines.push('');
        lines.push(`**Issue:** ${f.message}`);
        lines.push('');
        lines.push(`**Suggestion:** ${f.suggestion}`);
        lines.push('---');
    }
    return lines.join('\n');
}
