import fs from 'fs';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { InputError } from '../../utils/errors';
import type { LeadMetadata } from '../../types';

const LeadRowSchema = z.object({
    title: z.string().default(''),
    url: z.string().default(''),
    snippet: z.string().default(''),
    location: z.string().optional(),
}).refine(row => row.title.trim() || row.url.trim(), {
    message: 'row needs a title or a url',
});

export const readUrlList = async (filePath: string): Promise<string[]> => {
    const text = await fs.promises.readFile(filePath, 'utf8');
    return text.split(/\r?\n/).map(l => l.trim()).filter(l => l.length > 0);
};

export const parseLeadsCsv = (csv: string): LeadMetadata[] => {
    let rows: unknown;
    try {
        rows = parse(csv, { columns: true, skip_empty_lines: true, trim: true });
    } catch (e) {
        throw new InputError(`Cannot parse leads CSV: ${e instanceof Error ? e.message : String(e)}`);
    }
    if (!Array.isArray(rows)) throw new InputError('Leads CSV did not produce rows');

    return rows.map((row: unknown, i: number) => {
        const result = LeadRowSchema.safeParse(row);
        // +2: header line, then 1-based
        const line = i + 2;
        if (!result.success) {
            throw new InputError(`Invalid lead on line ${line}: ${result.error.issues.map(x => x.message).join(', ')}`, line);
        }
        const { title, url, snippet, location } = result.data;
        return location ? { title, url, snippet, location } : { title, url, snippet };
    });
};

export const readLeadsCsv = async (filePath: string): Promise<LeadMetadata[]> =>
    parseLeadsCsv(await fs.promises.readFile(filePath, 'utf8'));
