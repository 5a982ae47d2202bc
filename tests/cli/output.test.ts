import { describe, it, expect } from 'vitest';
import { formatJson, formatPretty, formatResult, formatText } from '../../src/cli/utils/output.js';
import type { RunResult } from '../../src/core/workflow/runner.js';

const complete: RunResult = {
    runId: 'sum-abc123',
    decision: 'GENERATE',
    generatedArtifact: 'def add(a, b):\n    return a + b',
    reviewFeedback: 'Looks fine.',
    documentedArtifact: '# Add two numbers\ndef add(a, b):\n    return a + b',
    approvalStatus: 'approved',
    retryCount: 1,
};

const fallback: RunResult = {
    runId: 'q-1',
    decision: 'UNKNOWN',
    documentedArtifact: 'Recursion is a function calling itself.',
    retryCount: 0,
};

describe('formatJson', () => {
    it('writes every field', () => {
        expect(JSON.parse(formatJson(complete))).toEqual(complete);
    });

    it('writes unset fields as null', () => {
        expect(JSON.parse(formatJson(fallback))).toEqual({
            runId: 'q-1',
            decision: 'UNKNOWN',
            generatedArtifact: null,
            reviewFeedback: null,
            documentedArtifact: 'Recursion is a function calling itself.',
            approvalStatus: null,
            retryCount: 0,
        });
    });

    it('adds the failure and ends with a newline', () => {
        const out = formatJson({ runId: 'r', retryCount: 0 }, { kind: 'service', message: 'rate limited' });
        expect(out.endsWith('}\n')).toBe(true);
        expect(JSON.parse(out).error).toEqual({ kind: 'service', message: 'rate limited' });
    });
});

describe('formatText', () => {
    it('prints labelled sections', () => {
        expect(formatText(complete)).toBe(
            [
                'Decision: GENERATE',
                'Generated Code:',
                'def add(a, b):',
                '    return a + b',
                'Review Feedback:',
                'Looks fine.',
                'Documented Code:',
                '# Add two numbers',
                'def add(a, b):',
                '    return a + b',
                'Approval Status: approved',
                '',
            ].join('\n'),
        );
    });

    it('prints N/A for unset fields and the failure last', () => {
        expect(formatText({ runId: 'r', decision: 'GENERATE', retryCount: 0 }, { kind: 'step', message: 'boom' })).toBe(
            [
                'Decision: GENERATE',
                'Generated Code:',
                'N/A',
                'Review Feedback:',
                'N/A',
                'Documented Code:',
                'N/A',
                'Approval Status: N/A',
                'Error (step): boom',
                '',
            ].join('\n'),
        );
    });
});

describe('formatPretty', () => {
    it('includes the content of each section and the run ID', () => {
        const out = formatPretty(complete);
        expect(out).toContain('Generated Code');
        expect(out).toContain('Looks fine.');
        expect(out).toContain('Run ID: sum-abc123');
    });

    it('skips sections without content', () => {
        expect(formatPretty(fallback)).not.toContain('Generated Code');
    });
});

describe('formatResult', () => {
    it('dispatches on the format', () => {
        expect(formatResult(complete, 'json')).toBe(formatJson(complete));
        expect(formatResult(complete, 'text')).toBe(formatText(complete));
        expect(formatResult(complete, 'pretty')).toBe(formatPretty(complete));
    });
});
