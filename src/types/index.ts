export type PageDocument = {
    readonly url: string; // final URL after redirects
    readonly content: string; // raw markup
    readonly status: number; // 0 when the fetch never produced a response
    readonly contentLength: number;
    readonly error?: string; // set on degraded documents
};

export type LeadMetadata = {
    readonly title: string;
    readonly url: string; // may be empty
    readonly snippet: string;
    readonly location?: string;
};

export enum IssueKind {
    MISSING_MOBILE_VIEWPORT = 'missing-mobile-viewport',
    INSECURE_TRANSPORT = 'insecure-transport',
    LEGACY_TABLE_LAYOUT = 'legacy-table-layout',
    DEPRECATED_MARKUP = 'deprecated-markup',
    LEGACY_MULTIMEDIA_PLUGIN = 'legacy-multimedia-plugin',
    POOR_TYPOGRAPHY_CHOICE = 'poor-typography-choice',
    STALE_COPYRIGHT_YEAR = 'stale-copyright-year',
    OVERSIZED_PAGE = 'oversized-page',
    MAINTENANCE_PLACEHOLDER = 'maintenance-placeholder',
    LOW_EFFORT_BUILDER = 'low-effort-builder',
    CONTENT_MANAGEMENT_FINGERPRINT = 'content-management-fingerprint',
    UNREACHABLE_SITE = 'unreachable-site',
    NO_WEBSITE = 'no-website',
    HOSTED_ON_SOCIAL_OR_DIRECTORY = 'hosted-on-social-or-directory',
    FREE_HOSTED_SUBDOMAIN = 'free-hosted-subdomain',
    TECHNOLOGY_STALENESS_IN_SNIPPET = 'technology-staleness-in-snippet',
    MANUAL_REVIEW = 'manual-review',
}

export type IssuePolarity = 'negative' | 'informational';

export type Issue = {
    readonly kind: IssueKind;
    readonly weight: number;
    readonly message: string;
    readonly polarity: IssuePolarity;
};

export type SiteScore = {
    readonly url: string;
    readonly title: string;
    readonly description: string;
    readonly status: number;
    readonly score: number; // 0-10, higher = worse site
    readonly clamped: boolean;
    readonly issues: readonly Issue[];
    readonly emails: readonly string[];
    readonly phones: readonly string[];
    readonly mobileFriendly: boolean;
    readonly secure: boolean;
    readonly pageSizeKb: number;
};

export type OpportunityScore = {
    readonly score: number; // 0-100, lower = hotter lead
    readonly clamped: boolean;
    readonly issues: readonly Issue[];
};

export type LeadResult = OpportunityScore & {
    readonly index: number;
    readonly lead: LeadMetadata;
};

export type DraftMessage = {
    readonly subject: string;
    readonly body: string;
    readonly businessName: string;
    readonly text: string;
};

export type SiteReport = {
    readonly index: number;
    readonly result: SiteScore;
    readonly draft: DraftMessage;
};

export type ContactSet = {
    readonly emails: readonly string[];
    readonly phones: readonly string[];
};

export const ISSUE_MARKERS = {
    negative: '❌',
    warning: '⚠️',
    info: 'ℹ️',
} as const;

export const issueMarker = (issue: Issue): string => {
    if (issue.polarity === 'negative') return ISSUE_MARKERS.negative;
    return issue.weight > 0 ? ISSUE_MARKERS.warning : ISSUE_MARKERS.info;
};

export const isNegative = (issue: Issue): boolean => issue.polarity === 'negative';
