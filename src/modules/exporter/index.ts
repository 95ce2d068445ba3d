import fs from 'fs';
import path from 'path';
import { createObjectCsvWriter } from 'csv-writer';
import type { LeadResult } from '../../types';

/**
 * Caller-owned persistence. The engine hands over finished records; where
 * and how they land is up to the sink.
 */
export interface ResultSink<T> {
    write(records: readonly T[]): Promise<string>;
}

const pad = (n: number): string => String(n).padStart(2, '0');

export const timestampSlug = (date: Date): string =>
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}-${pad(date.getHours())}${pad(date.getMinutes())}`;

export class JsonFileSink<T> implements ResultSink<T> {
    /**
     * `target` ending in `.json` is used as-is; anything else is treated as a
     * directory and gets a timestamped `analysis-*.json` inside it.
     */
    constructor(private target: string, private now: () => Date = () => new Date()) {}

    async write(records: readonly T[]): Promise<string> {
        const file = this.target.endsWith('.json')
            ? this.target
            : path.join(this.target, `analysis-${timestampSlug(this.now())}.json`);
        await fs.promises.mkdir(path.dirname(file), { recursive: true });
        await fs.promises.writeFile(file, JSON.stringify(records, null, 2));
        return file;
    }
}

const LEAD_HEADERS = [
    { id: 'index', title: 'index' },
    { id: 'score', title: 'score' },
    { id: 'title', title: 'title' },
    { id: 'url', title: 'url' },
    { id: 'location', title: 'location' },
    { id: 'issues', title: 'issues' },
];

export class LeadCsvSink implements ResultSink<LeadResult> {
    constructor(private file: string) {}

    async write(records: readonly LeadResult[]): Promise<string> {
        await fs.promises.mkdir(path.dirname(this.file), { recursive: true });
        const writer = createObjectCsvWriter({ path: this.file, header: LEAD_HEADERS });
        await writer.writeRecords(records.map(r => ({
            index: r.index,
            score: r.score,
            title: r.lead.title,
            url: r.lead.url,
            location: r.lead.location || '',
            issues: r.issues.map(i => i.message).join('; '),
        })));
        return this.file;
    }
}
