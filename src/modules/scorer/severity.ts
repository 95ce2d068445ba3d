import { IssueKind } from '../../types';
import type { Issue, PageDocument, SiteScore } from '../../types';
import { getConfig } from '../../config';
import { SignalExtractor } from '../signal';
import { ContactExtractor } from '../contacts';
import { PageExtractor } from '../extractor';

const REASON_MAX = 80;

/**
 * Single-site severity score: 0..10, ascending. Higher means a worse site.
 *
 * Sums the weights of every fired page rule and clamps at the configured
 * maximum. Not to be confused with {@link OpportunityScorer}, which runs
 * the other way round.
 */
export class SeverityScorer {

    static score(document: PageDocument): SiteScore {
        const { severity } = getConfig();

        if (this.isDegraded(document)) {
            return this.unreachable(document, severity.unreachable_score);
        }

        const issues = SignalExtractor.extract(document);
        const contacts = ContactExtractor.extract(document.content);
        const meta = PageExtractor.extract(document.content, document.url);

        const raw = issues.reduce((sum, issue) => sum + issue.weight, 0);
        const score = Math.max(0, Math.min(severity.max_score, raw));

        return {
            url: document.url,
            title: meta.title,
            description: meta.description,
            status: document.status,
            score,
            clamped: score !== raw,
            issues,
            emails: contacts.emails,
            phones: contacts.phones,
            mobileFriendly: SignalExtractor.hasViewport(document.content.toLowerCase()),
            secure: SignalExtractor.isSecure(document.url),
            pageSizeKb: Math.round(document.contentLength / 1024),
        };
    }

    static isDegraded(document: PageDocument): boolean {
        return document.status === 0 || document.content.length === 0;
    }

    private static unreachable(document: PageDocument, score: number): SiteScore {
        const reason = document.error || (document.status === 0 ? 'no response' : `HTTP ${document.status} with empty body`);
        const issue: Issue = {
            kind: IssueKind.UNREACHABLE_SITE,
            weight: score,
            message: `Site unreachable: ${reason.substring(0, REASON_MAX)}`,
            polarity: 'negative',
        };

        return {
            url: document.url,
            title: document.url,
            description: '',
            status: document.status,
            score,
            clamped: false,
            issues: [issue],
            emails: [],
            phones: [],
            mobileFriendly: false,
            secure: false,
            pageSizeKb: 0,
        };
    }
}
