import { IssueKind } from '../../types';
import type { Issue, LeadMetadata, LeadResult, OpportunityScore } from '../../types';
import { getConfig } from '../../config';

export type LeadBucket = 'hot' | 'warm' | 'cool';

const MAX_OPPORTUNITY = 100;

/**
 * Lead-opportunity score: 0..100, descending. Starts at a neutral baseline
 * and subtracts penalties, so a weaker web presence means a lower score and a
 * hotter lead. A business with no site at all scores 0.
 */
export class OpportunityScorer {

    static score(url: string, title: string, snippet: string): OpportunityScore {
        const { opportunity, lists } = getConfig();
        const p = opportunity.penalties;

        if (!url.trim()) {
            return {
                score: 0,
                clamped: false,
                issues: [{ kind: IssueKind.NO_WEBSITE, weight: 0, message: 'No website found', polarity: 'negative' }],
            };
        }

        const issues: Issue[] = [];
        const host = this.hostOf(url);
        const snippetLower = snippet.toLowerCase();

        // Domain rules first
        const builder = this.matchDomain(host, lists.builder_domains);
        if (builder) {
            issues.push({ kind: IssueKind.LOW_EFFORT_BUILDER, weight: p.builder, message: `Site on low-cost builder (${builder})`, polarity: 'negative' });
        }

        const social = this.matchDomain(host, lists.social_domains);
        if (social) {
            issues.push({ kind: IssueKind.HOSTED_ON_SOCIAL_OR_DIRECTORY, weight: p.social_or_directory, message: `Only a social/directory page (${social})`, polarity: 'negative' });
        }

        const freeHost = lists.free_hosted_domains.find(d => host.endsWith(`.${d}`));
        if (freeHost) {
            issues.push({ kind: IssueKind.FREE_HOSTED_SUBDOMAIN, weight: p.free_hosted, message: `Free ${freeHost} subdomain`, polarity: 'negative' });
        }

        // Then the snippet
        const parked = lists.parked_phrases.find(phrase => snippetLower.includes(phrase));
        if (parked) {
            issues.push({ kind: IssueKind.MAINTENANCE_PLACEHOLDER, weight: p.parked, message: `Parked or unfinished site ("${parked}")`, polarity: 'negative' });
        }

        const legacy = lists.legacy_tech_keywords.find(keyword => snippetLower.includes(keyword));
        if (legacy) {
            issues.push({ kind: IssueKind.TECHNOLOGY_STALENESS_IN_SNIPPET, weight: p.legacy_tech, message: `Outdated technology mentioned ("${legacy}")`, polarity: 'negative' });
        }

        if (issues.length === 0) {
            issues.push({ kind: IssueKind.MANUAL_REVIEW, weight: 0, message: 'Website found — may need manual review', polarity: 'informational' });
        }

        const raw = issues.reduce((score, issue) => score - issue.weight, opportunity.baseline);
        const score = Math.max(0, Math.min(MAX_OPPORTUNITY, raw));

        return { score, clamped: score !== raw, issues };
    }

    static scoreLead(lead: LeadMetadata, index: number): LeadResult {
        return { ...this.score(lead.url, lead.title, lead.snippet), index, lead };
    }

    static bucket(score: number): LeadBucket {
        const { bands } = getConfig().opportunity;
        if (score < bands.hot_below) return 'hot';
        if (score < bands.warm_below) return 'warm';
        return 'cool';
    }

    static hostOf(url: string): string {
        const trimmed = url.trim();
        const withProtocol = /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
        try {
            return new URL(withProtocol).hostname.replace(/^www\./, '').toLowerCase();
        } catch {
            // Not a parseable URL; fall back to the first path segment
            return trimmed.toLowerCase().replace(/^[a-z]+:\/\//, '').split(/[/?#]/)[0].replace(/^www\./, '');
        }
    }

    private static matchDomain(host: string, domains: string[]): string | undefined {
        return domains.find(d => host === d || host.endsWith(`.${d}`));
    }
}
