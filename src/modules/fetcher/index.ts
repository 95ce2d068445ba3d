import axios from 'axios';
import type { AxiosAdapter, AxiosInstance } from 'axios';
import * as rax from 'retry-axios';
import { getConfig } from '../../config';
import { FetchError, errorMessage } from '../../utils/errors';
import { getLogger, Logger } from '../observability';
import type { PageDocument } from '../../types';

export interface FetcherOptions {
    timeoutMs?: number;
    retries?: number;
    adapter?: AxiosAdapter; // in-process stand-in for tests
}

export const normalizeUrl = (url: string): string => {
    const trimmed = url.trim();
    return /^https?:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
};

/**
 * Stand-in document for a site that could not be fetched. Scoring turns it
 * into a single unreachable-site issue instead of aborting a batch.
 */
export const degradedDocument = (url: string, reason: string): PageDocument => ({
    url,
    content: '',
    status: 0,
    contentLength: 0,
    error: reason,
});

export class Fetcher {
    private client: AxiosInstance;

    constructor(options: FetcherOptions = {}) {
        const config = getConfig();
        this.client = axios.create({
            timeout: options.timeoutMs ?? config.fetcher.timeout_ms,
            maxRedirects: 5,
            responseType: 'text',
            // 4xx pages still have markup worth scoring
            validateStatus: status => status < 500,
            adapter: options.adapter,
            headers: {
                'User-Agent': config.fetcher.user_agent,
                'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
                'Accept-Language': 'en-US,en;q=0.9',
            },
            raxConfig: {
                retry: options.retries ?? config.fetcher.retries,
                noResponseRetries: options.retries ?? config.fetcher.retries,
                retryDelay: config.fetcher.backoff_ms,
                httpMethodsToRetry: ['GET', 'HEAD'],
                statusCodesToRetry: [[500, 599]],
                backoffType: 'exponential',
            },
        });
        rax.attach(this.client);
    }

    async fetch(url: string): Promise<PageDocument> {
        const target = normalizeUrl(url);
        try {
            const response = await this.client.get<string>(target);
            const content = typeof response.data === 'string' ? response.data : JSON.stringify(response.data);
            return this.toDocument(response.request?.res?.responseUrl || target, response.status, content);
        } catch (e) {
            if (!axios.isAxiosError(e)) throw new FetchError(errorMessage(e), target);
            // 5xx after retries: score whatever markup the server still sent
            const body: unknown = e.response?.data;
            if (e.response && typeof body === 'string' && body.length > 0) {
                return this.toDocument(target, e.response.status, body);
            }
            throw new FetchError(errorMessage(e), target, e.response?.status ?? 0);
        }
    }

    private toDocument(url: string, status: number, content: string): PageDocument {
        getLogger().debug(`Fetched ${url} (HTTP ${status}, ${content.length} chars)`, { url, status });
        return { url, content, status, contentLength: content.length };
    }

    /**
     * Never rejects: failures come back as a degraded document.
     */
    async fetchOrDegrade(url: string): Promise<PageDocument> {
        try {
            return await this.fetch(url);
        } catch (e) {
            const error = e instanceof Error ? e : new Error(String(e));
            getLogger().warn(`Fetch failed for ${url}: ${error.message}`, {
                url,
                category: Logger.categorizeError(error),
            });
            return degradedDocument(normalizeUrl(url), error.message);
        }
    }
}
