import { IssueKind } from '../../types';
import type { Issue, PageDocument } from '../../types';
import { getConfig } from '../../config';

const COPYRIGHT_PATTERN = /(?:©|&copy;|copyright)\s*(\d{4})/g;
const DEFAULT_THEME_MARKER = 'twentytwenty';

const negative = (kind: IssueKind, weight: number, message: string): Issue =>
    ({ kind, weight, message, polarity: 'negative' });

const informational = (kind: IssueKind, weight: number, message: string): Issue =>
    ({ kind, weight, message, polarity: 'informational' });

export class SignalExtractor {

    /**
     * Evaluates every page rule in a fixed order and returns one issue per rule
     * that fires. The order is part of the output: drafts and reports truncate
     * on it.
     */
    static extract(document: PageDocument): Issue[] {
        const { severity, lists } = getConfig();
        const w = severity.weights;
        const html = document.content;
        const lower = html.toLowerCase();
        const issues: Issue[] = [];

        // R1 Mobile viewport
        if (!this.hasViewport(lower)) {
            issues.push(negative(IssueKind.MISSING_MOBILE_VIEWPORT, w.missing_viewport, 'Not mobile responsive'));
        }

        // R2 Transport
        if (this.isInsecure(document.url)) {
            issues.push(negative(IssueKind.INSECURE_TRANSPORT, w.insecure_transport, 'No HTTPS (insecure)'));
        }

        // R3 Table layout
        if (this.countOccurrences(lower, '<table') > severity.table_threshold) {
            issues.push(negative(IssueKind.LEGACY_TABLE_LAYOUT, w.table_layout, 'Table-based layout (very outdated)'));
        }

        // R4 / R5 Deprecated markup
        if (lower.includes('<marquee')) {
            issues.push(negative(IssueKind.DEPRECATED_MARKUP, w.marquee, 'Uses <marquee> (ancient)'));
        }
        if (lower.includes('<frame') || lower.includes('<frameset')) {
            issues.push(negative(IssueKind.DEPRECATED_MARKUP, w.frames, 'Uses frames'));
        }

        // R6 Flash needs both the keyword and a plugin token
        if (lower.includes('flash') && (lower.includes('.swf') || lower.includes('swfobject'))) {
            issues.push(negative(IssueKind.LEGACY_MULTIMEDIA_PLUGIN, w.flash, 'Uses Flash'));
        }

        // R7 Typography
        if (lower.includes('comic sans') || lower.includes('papyrus')) {
            issues.push(negative(IssueKind.POOR_TYPOGRAPHY_CHOICE, w.typography, 'Comic Sans / Papyrus font'));
        }

        // R8 Copyright year, first stale match only
        const staleYear = this.findStaleCopyrightYear(lower, severity.copyright_cutoff_year);
        if (staleYear !== null) {
            issues.push(negative(IssueKind.STALE_COPYRIGHT_YEAR, w.stale_copyright, `Copyright year: ${staleYear}`));
        }

        // R9 Page weight, measured on the raw content
        if (html.length > severity.heavy_page_chars) {
            issues.push(informational(IssueKind.OVERSIZED_PAGE, w.heavy_page, 'Very heavy page (slow load)'));
        }

        // R10 Placeholder pages
        if (lower.includes('under construction') || lower.includes('coming soon')) {
            issues.push(negative(IssueKind.MAINTENANCE_PLACEHOLDER, w.under_construction, 'Under construction / coming soon'));
        }

        // R11 Builders, one note per platform
        for (const builder of lists.site_builders) {
            if (lower.includes(builder.marker.toLowerCase())) {
                issues.push(informational(IssueKind.LOW_EFFORT_BUILDER, 0, `Built on ${builder.name}`));
            }
        }

        // R12 WordPress. The default-theme note never carries weight.
        if (lower.includes('wp-content')) {
            issues.push(informational(IssueKind.CONTENT_MANAGEMENT_FINGERPRINT, 0, 'WordPress site'));
            if (lower.includes(DEFAULT_THEME_MARKER)) {
                issues.push(informational(IssueKind.CONTENT_MANAGEMENT_FINGERPRINT, 0, 'Default WordPress theme'));
            }
        }

        return issues;
    }

    static hasViewport(lowerHtml: string): boolean {
        return /<meta\s+name=["']?viewport/.test(lowerHtml);
    }

    static isInsecure(url: string): boolean {
        return url.toLowerCase().startsWith('http://');
    }

    static isSecure(url: string): boolean {
        return url.toLowerCase().startsWith('https');
    }

    private static countOccurrences(haystack: string, needle: string): number {
        let count = 0;
        let from = haystack.indexOf(needle);
        while (from !== -1) {
            count++;
            from = haystack.indexOf(needle, from + needle.length);
        }
        return count;
    }

    private static findStaleCopyrightYear(lowerHtml: string, cutoff: number): number | null {
        for (const match of lowerHtml.matchAll(COPYRIGHT_PATTERN)) {
            const year = parseInt(match[1], 10);
            if (year < cutoff) return year;
        }
        return null;
    }
}
