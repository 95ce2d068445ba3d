import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, expect, it } from 'vitest';
import { JsonFileSink, LeadCsvSink, timestampSlug } from '../src/modules/exporter';
import { Pipeline } from '../src/pipeline';

const tmpDir = (): string => fs.mkdtempSync(path.join(os.tmpdir(), 'site-leads-out-'));

describe('timestampSlug', () => {
    it('formats local time as YYYYMMDD-HHmm', () => {
        expect(timestampSlug(new Date(2024, 2, 5, 9, 7))).toBe('20240305-0907');
    });
});

describe('JsonFileSink', () => {
    it('writes a timestamped file inside a directory', async () => {
        const dir = path.join(tmpDir(), 'leads');
        const sink = new JsonFileSink<{ n: number }>(dir, () => new Date(2024, 2, 5, 9, 7));
        const file = await sink.write([{ n: 1 }, { n: 2 }]);
        expect(file).toBe(path.join(dir, 'analysis-20240305-0907.json'));
        expect(JSON.parse(fs.readFileSync(file, 'utf8'))).toEqual([{ n: 1 }, { n: 2 }]);
    });

    it('uses an explicit .json path as-is', async () => {
        const file = path.join(tmpDir(), 'out.json');
        expect(await new JsonFileSink<string>(file).write(['a'])).toBe(file);
        expect(fs.readFileSync(file, 'utf8')).toBe('[\n  "a"\n]');
    });
});

describe('LeadCsvSink', () => {
    it('writes one row per lead with a header', async () => {
        const file = path.join(tmpDir(), 'leads.csv');
        const results = Pipeline.scoreLeads([
            { title: 'Taco Rio', url: '', snippet: '', location: 'Springfield' },
            { title: 'Book Nook', url: 'https://booknook.example', snippet: 'Open daily' },
        ]);
        await new LeadCsvSink(file).write(results);
        expect(fs.readFileSync(file, 'utf8').split('\n')).toEqual([
            'index,score,title,url,location,issues',
            '0,0,Taco Rio,,Springfield,No website found',
            '1,50,Book Nook,https://booknook.example,,Website found — may need manual review',
            '',
        ]);
    });
});
