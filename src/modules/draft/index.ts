import type { DraftMessage, Issue } from '../../types';
import { isNegative } from '../../types';
import { getConfig } from '../../config';

export const FALLBACK_BUSINESS_NAME = 'your business';
const MAX_BUSINESS_NAME = 40;
const MAX_LISTED_ISSUES = 3;

const MOBILE_PARAGRAPH = "Over 60% of your potential customers are searching on their phones. If your site doesn't work on mobile, you're invisible to them.";

export type DraftSource = {
    readonly url: string;
    readonly issues: readonly Issue[];
    readonly mobileFriendly: boolean;
};

export class DraftGenerator {

    /**
     * Builds the cold outreach message for a scored site. Output depends only
     * on the arguments and the outreach settings.
     */
    static generate(result: DraftSource, titleHint: string): DraftMessage {
        const { outreach } = getConfig();
        const biz = this.businessName(titleHint, result.url);
        const painPoints = result.issues.filter(isNegative);

        const subject = `Quick question about ${biz}'s website`;
        const lines: string[] = [
            'Hi,',
            '',
            `${this.hook(painPoints)}. I specialize in rebuilding websites for local businesses — fast, affordable, and designed to actually bring in customers.`,
        ];

        if (painPoints.length > 0) {
            lines.push('', "Here's what I found:");
            for (const issue of painPoints.slice(0, MAX_LISTED_ISSUES)) {
                lines.push(`  • ${issue.message}`);
            }
        }

        if (!result.mobileFriendly) {
            lines.push('', MOBILE_PARAGRAPH);
        }

        lines.push(
            '',
            `We can have a modern, mobile-friendly website live for ${biz} within 48 hours — ${outreach.offer}.`,
            '',
            `Take a look at what we do: ${outreach.website}`,
            '',
            "Would you be open to a free site analysis? No obligation — just a quick report on what's working and what's not.",
            '',
            'Best,',
            ...[outreach.sender_name, outreach.sender_company, outreach.sender_email].filter(Boolean),
        );

        const body = lines.join('\n');
        return {
            subject,
            body,
            businessName: biz,
            text: `Subject: ${subject}\n\n${body}`,
        };
    }

    /**
     * Cuts a page title down to the business name: first segment before `|`,
     * then `-`, then `—`.
     */
    static businessName(titleHint: string, url: string): string {
        const name = titleHint.split('|')[0].split('-')[0].split('—')[0].trim();
        if (!name || name.length > MAX_BUSINESS_NAME || name === url) return FALLBACK_BUSINESS_NAME;
        return name;
    }

    static hook(painPoints: readonly Issue[]): string {
        if (painPoints.length === 0) return 'I noticed your website could use a refresh';
        if (painPoints.length === 1) return `I noticed ${painPoints[0].message.toLowerCase()} on your website`;
        return `I found ${painPoints.length} issues with your current website that are likely costing you customers`;
    }
}
