import pLimit from 'p-limit';
import { SeverityScorer, OpportunityScorer } from '../modules/scorer';
import { DraftGenerator } from '../modules/draft';
import { getLogger, Metrics } from '../modules/observability';
import { degradedDocument } from '../modules/fetcher';
import { getConfig } from '../config';
import { errorMessage } from '../utils/errors';
import type { LeadMetadata, LeadResult, PageDocument, SiteReport } from '../types';

/** Anything that can turn a URL into a document. Rejections are degraded too. */
export interface DocumentSource {
    fetchOrDegrade(url: string): Promise<PageDocument>;
}

export interface BatchOptions {
    concurrency?: number;
}

export class Pipeline {

    /**
     * Score → draft for one already-fetched document. Pure.
     */
    static analyzeDocument(document: PageDocument, index = 0): SiteReport {
        const result = SeverityScorer.score(document);
        // an unreachable site's title is its URL, which says nothing about the business
        const titleHint = SeverityScorer.isDegraded(document) ? '' : result.title;
        const draft = DraftGenerator.generate(result, titleHint);
        return { index, result, draft };
    }

    /**
     * Fetches and analyzes each URL with bounded parallelism. Items are
     * independent; the returned array follows input order and every entry
     * carries its input index.
     */
    static async analyzeUrls(urls: readonly string[], source: DocumentSource, options: BatchOptions = {}): Promise<SiteReport[]> {
        const logger = getLogger();
        const metrics = new Metrics();
        const limit = pLimit(options.concurrency ?? getConfig().system.concurrency);

        logger.info(`Analyzing ${urls.length} site(s)`);

        const reports = await Promise.all(urls.map((url, index) => limit(async () => {
            const start = Date.now();
            const document = await source.fetchOrDegrade(url).catch((e: unknown) => {
                logger.error(`Document source rejected ${url}`, { url, error: errorMessage(e) });
                return degradedDocument(url, errorMessage(e));
            });
            const report = this.analyzeDocument(document, index);
            const duration = Date.now() - start;
            metrics.recordSite(report, duration);
            logger.info(`Analyzed ${url} -> ${report.result.score}/10 (${duration}ms)`, {
                url,
                issues: report.result.issues.length,
            });
            return report;
        })));

        logger.info('Site batch finished', metrics.getSummary());
        return reports;
    }

    static scoreLeads(leads: readonly LeadMetadata[]): LeadResult[] {
        const logger = getLogger();
        const metrics = new Metrics();

        const results = leads.map((lead, index) => {
            const result = OpportunityScorer.scoreLead(lead, index);
            metrics.recordLead(result);
            return result;
        });

        logger.info('Lead batch finished', metrics.getSummary());
        return results;
    }
}
