import { describe, expect, it } from 'vitest';
import { ErrorCategory, Logger, Metrics } from '../src/modules/observability';
import { Pipeline } from '../src/pipeline';
import { degradedDocument } from '../src/modules/fetcher';

describe('Logger.categorizeError', () => {
    it('categorizes network errors', () => {
        expect(Logger.categorizeError(new Error('timeout of 10000ms exceeded'))).toBe(ErrorCategory.NETWORK);
        expect(Logger.categorizeError(new Error('getaddrinfo ENOTFOUND shop.example'))).toBe(ErrorCategory.NETWORK);
    });

    it('categorizes auth errors', () => {
        expect(Logger.categorizeError(new Error('Request failed with status code 429'))).toBe(ErrorCategory.AUTH);
    });

    it('categorizes parsing errors', () => {
        expect(Logger.categorizeError(new Error('Unexpected token < in JSON at position 0'))).toBe(ErrorCategory.PARSING);
    });

    it('categorizes validation errors', () => {
        expect(Logger.categorizeError(new Error('Invalid URL'))).toBe(ErrorCategory.VALIDATION);
    });

    it('falls back to logic errors', () => {
        expect(Logger.categorizeError(new Error('unhandled branch'))).toBe(ErrorCategory.LOGIC);
    });
});

describe('Metrics', () => {
    it('counts lead bands and missing websites', () => {
        const metrics = new Metrics();
        for (const r of Pipeline.scoreLeads([
            { title: 'A', url: '', snippet: '' },
            { title: 'B', url: 'https://b.example', snippet: '' },
            { title: 'C', url: 'https://facebook.com/c', snippet: '' },
        ])) {
            metrics.recordLead(r);
        }
        expect(metrics.getSummary()).toMatchObject({ total: 3, hot: 1, warm: 1, cool: 1, no_website: 1 });
    });

    it('averages site latency and counts unreachable sites', () => {
        const metrics = new Metrics();
        metrics.recordSite(Pipeline.analyzeDocument(degradedDocument('https://x.example', 'timeout')), 30);
        metrics.recordSite(Pipeline.analyzeDocument({ url: 'https://y.example', content: '<p>y</p>', status: 200, contentLength: 8 }), 11);
        expect(metrics.getSummary()).toMatchObject({ total: 2, unreachable: 1, avg_latency: 21 });
    });
});
