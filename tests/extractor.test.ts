import { describe, expect, it } from 'vitest';
import { PageExtractor } from '../src/modules/extractor';

describe('PageExtractor', () => {
    it('reads the title and description only', () => {
        const html = '<html><head><title>  Rosa\'s\n  Bakery </title><meta name="description" content=" Fresh bread daily "><meta name="generator" content="WordPress 6.4"></head></html>';
        expect(PageExtractor.extract(html, 'https://rosas.example')).toEqual({
            title: "Rosa's Bakery",
            description: 'Fresh bread daily',
        });
    });

    it('falls back when there is no markup or no title', () => {
        expect(PageExtractor.extract('', 'https://a.example')).toEqual({ title: 'https://a.example', description: '' });
        expect(PageExtractor.extract('<p>hi</p>', 'https://a.example').title).toBe('https://a.example');
    });

    it('truncates long titles and descriptions', () => {
        const html = `<title>${'t'.repeat(150)}</title><meta name="description" content="${'d'.repeat(250)}">`;
        const meta = PageExtractor.extract(html, 'https://a.example');
        expect(meta.title).toBe('t'.repeat(120));
        expect(meta.description).toBe('d'.repeat(200));
    });
});
