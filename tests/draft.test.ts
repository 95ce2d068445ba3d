import { describe, expect, it } from 'vitest';
import { DraftGenerator, FALLBACK_BUSINESS_NAME } from '../src/modules/draft';
import { IssueKind } from '../src/types';
import type { Issue } from '../src/types';

const bad = (message: string): Issue => ({ kind: IssueKind.DEPRECATED_MARKUP, weight: 2, message, polarity: 'negative' });
const note = (message: string): Issue => ({ kind: IssueKind.LOW_EFFORT_BUILDER, weight: 0, message, polarity: 'informational' });

const source = (issues: Issue[], mobileFriendly = true) => ({ url: 'https://joes.example', issues, mobileFriendly });

describe('DraftGenerator.businessName', () => {
    it('cuts at |, then -, then —', () => {
        expect(DraftGenerator.businessName("Joe's Pizza | Chicago", 'u')).toBe("Joe's Pizza");
        expect(DraftGenerator.businessName('Bella - Italian Kitchen', 'u')).toBe('Bella');
        expect(DraftGenerator.businessName('Taco Rio — Best tacos', 'u')).toBe('Taco Rio');
        expect(DraftGenerator.businessName('A - B | C', 'u')).toBe('A');
    });

    it('falls back when the name is too long', () => {
        expect(DraftGenerator.businessName('The Original Family Owned Neighborhood Bakery', 'u')).toBe(FALLBACK_BUSINESS_NAME);
        expect(DraftGenerator.businessName('x'.repeat(40), 'u')).toBe('x'.repeat(40));
    });

    it('falls back when the name is just the URL', () => {
        expect(DraftGenerator.businessName('https://joes.example', 'https://joes.example')).toBe(FALLBACK_BUSINESS_NAME);
    });
});

describe('DraftGenerator.generate', () => {
    it('uses the refresh hook with no negative issues', () => {
        const draft = DraftGenerator.generate(source([note('Built on Wix')]), "Joe's Pizza | Chicago");
        expect(draft.body.split('\n')[2]).toBe(
            'I noticed your website could use a refresh. I specialize in rebuilding websites for local businesses — fast, affordable, and designed to actually bring in customers.'
        );
        expect(draft.body).not.toContain("Here's what I found:");
    });

    it('names the single issue', () => {
        const draft = DraftGenerator.generate(source([bad('No HTTPS (insecure)')]), 'Joe');
        expect(draft.body.split('\n')[2].startsWith('I noticed no https (insecure) on your website. ')).toBe(true);
    });

    it('counts issues when there are several', () => {
        const draft = DraftGenerator.generate(source([bad('A'), bad('B'), bad('C')]), 'Joe');
        expect(draft.body.split('\n')[2].startsWith('I found 3 issues with your current website that are likely costing you customers. ')).toBe(true);
    });

    it('lists at most three negative issues in order', () => {
        const draft = DraftGenerator.generate(source([bad('First'), note('Built on Wix'), bad('Second'), bad('Third'), bad('Fourth')]), 'Joe');
        const lines = draft.body.split('\n');
        const start = lines.indexOf("Here's what I found:");
        expect(lines.slice(start + 1, start + 4)).toEqual(['  • First', '  • Second', '  • Third']);
        expect(draft.body).not.toContain('Fourth');
        expect(draft.body).not.toContain('Built on Wix');
    });

    it('adds the mobile paragraph only for sites that are not mobile friendly', () => {
        const mobileLine = "Over 60% of your potential customers are searching on their phones. If your site doesn't work on mobile, you're invisible to them.";
        expect(DraftGenerator.generate(source([], false), 'Joe').body).toContain(mobileLine);
        expect(DraftGenerator.generate(source([], true), 'Joe').body).not.toContain(mobileLine);
    });

    it('builds subject, text and closing', () => {
        const draft = DraftGenerator.generate(source([]), "Joe's Pizza | Chicago");
        expect(draft.businessName).toBe("Joe's Pizza");
        expect(draft.subject).toBe("Quick question about Joe's Pizza's website");
        expect(draft.text.startsWith("Subject: Quick question about Joe's Pizza's website\n\nHi,\n\n")).toBe(true);
        expect(draft.body).toContain("We can have a modern, mobile-friendly website live for Joe's Pizza within 48 hours — starting at $0 down, $20/month (everything included).");
        expect(draft.body).toContain('Take a look at what we do: https://example.com');
        expect(draft.body.endsWith('Best,\nYour Name\nYour Studio\nhello@example.com')).toBe(true);
    });

    it('is deterministic', () => {
        const input = source([bad('A'), bad('B')], false);
        expect(DraftGenerator.generate(input, 'Joe')).toEqual(DraftGenerator.generate(input, 'Joe'));
    });
});
