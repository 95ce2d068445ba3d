import type { LeadResult, SiteReport } from '../../types';
import { issueMarker } from '../../types';
import { getConfig } from '../../config';
import { OpportunityScorer } from '../scorer';
import type { LeadBucket } from '../scorer';

const BANNER = '='.repeat(60);
const MAX_FLAMES = 5;

const COLUMNS = [
    { title: 'SCORE', width: 5 },
    { title: 'BUSINESS', width: 30 },
    { title: 'LOCATION', width: 18 },
    { title: 'URL', width: 34 },
    { title: 'TOP ISSUE', width: 0 }, // last column is not padded
] as const;

const yesNo = (flag: boolean): string => (flag ? '✅ Yes' : '❌ NO');

const fit = (value: string, width: number): string => {
    if (width === 0) return value;
    if (value.length > width) return `${value.substring(0, width - 1)}…`;
    return value.padEnd(width);
};

export class ReportFormatter {

    static formatSite(report: SiteReport): string {
        const { result, draft } = report;
        const flames = '🔥'.repeat(Math.min(Math.floor(result.score), MAX_FLAMES));

        const lines = [
            BANNER,
            `LEAD REPORT: ${result.title}`,
            BANNER,
            `URL:      ${result.url}`,
            `Score:    ${flames} (${result.score}/10)`,
            `Mobile:   ${yesNo(result.mobileFriendly)}`,
            `HTTPS:    ${yesNo(result.secure)}`,
            `Size:     ${result.pageSizeKb} KB`,
        ];

        if (result.emails.length > 0) lines.push(`Emails:   ${result.emails.join(', ')}`);
        if (result.phones.length > 0) lines.push(`Phones:   ${result.phones.join(', ')}`);

        if (result.issues.length > 0) {
            lines.push('', 'Issues found:');
            for (const issue of result.issues) {
                lines.push(`  ${issueMarker(issue)} ${issue.message}`);
            }
        }

        lines.push('', '--- EMAIL DRAFT ---', '', draft.text, '');
        return lines.join('\n');
    }

    /**
     * Worst web presence first. Ties keep input order.
     */
    static sortLeads(results: readonly LeadResult[]): LeadResult[] {
        return [...results].sort((a, b) => a.score - b.score || a.index - b.index);
    }

    static summarize(results: readonly LeadResult[]): Record<LeadBucket, number> {
        const counts: Record<LeadBucket, number> = { hot: 0, warm: 0, cool: 0 };
        for (const r of results) counts[OpportunityScorer.bucket(r.score)]++;
        return counts;
    }

    static formatLeadTable(results: readonly LeadResult[]): string {
        const { bands } = getConfig().opportunity;
        const row = (cells: string[]) => cells.map((c, i) => fit(c, COLUMNS[i].width)).join('  ').trimEnd();

        const lines = [
            row(COLUMNS.map(c => c.title)),
            row(COLUMNS.map(c => '-'.repeat(c.width || c.title.length))),
        ];

        for (const r of this.sortLeads(results)) {
            lines.push(row([
                String(r.score),
                r.lead.title || '(untitled)',
                r.lead.location || '',
                r.lead.url || '(none)',
                r.issues.length > 0 ? r.issues[0].message : '',
            ]));
        }

        const counts = this.summarize(results);
        lines.push(
            '',
            `Hot leads (<${bands.hot_below}):      ${counts.hot}`,
            `Warm leads (${bands.hot_below}-${bands.warm_below - 1}):   ${counts.warm}`,
            `Cool leads (>=${bands.warm_below}):    ${counts.cool}`,
        );
        return lines.join('\n');
    }
}
