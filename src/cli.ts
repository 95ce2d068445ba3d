#!/usr/bin/env node
import { Command } from 'commander';
import path from 'path';
import { Pipeline } from './pipeline';
import { Fetcher } from './modules/fetcher';
import { ReportFormatter } from './modules/report';
import { JsonFileSink, LeadCsvSink } from './modules/exporter';
import { readLeadsCsv, readUrlList } from './modules/ingestor';
import { loadConfig } from './config';
import { errorMessage } from './utils/errors';

const program = new Command();

program
    .name('site-leads')
    .description('Score local-business websites and draft outreach')
    .version('1.0.0')
    .option('--config <path>', 'Path to custom config YAML')
    .hook('preAction', (command) => {
        const configPath: unknown = command.opts().config;
        loadConfig(typeof configPath === 'string' ? path.resolve(configPath) : undefined);
    });

const fail = (e: unknown): never => {
    console.error('Fatal Error:', errorMessage(e));
    process.exit(1);
};

program
    .command('analyze')
    .description('Analyze one website, or a file of URLs')
    .argument('[url]', 'Website URL to analyze')
    .option('-b, --batch <path>', 'File with URLs, one per line')
    .option('--json', 'Print JSON instead of text reports')
    .option('-o, --out <dir>', 'Directory for the saved JSON analysis', 'leads')
    .option('-c, --concurrency <n>', 'Parallel fetches', (v) => parseInt(v, 10))
    .action(async (url: string | undefined, options: { batch?: string; json?: boolean; out: string; concurrency?: number }) => {
        try {
            const urls = options.batch ? await readUrlList(path.resolve(options.batch)) : url ? [url] : [];
            if (urls.length === 0) {
                program.commands.find(c => c.name() === 'analyze')?.help();
                return;
            }

            for (const u of urls) console.error(`Analyzing ${u}...`);
            const reports = await Pipeline.analyzeUrls(urls, new Fetcher(), { concurrency: options.concurrency });

            if (options.json) {
                console.log(JSON.stringify(reports, null, 2));
            } else {
                for (const report of reports) console.log(ReportFormatter.formatSite(report));
            }

            const saved = await new JsonFileSink<typeof reports[number]>(path.resolve(options.out)).write(reports);
            console.error(`\n📁 Saved: ${saved}`);
        } catch (e) {
            fail(e);
        }
    });

program
    .command('leads')
    .description('Rank businesses from search-result metadata (CSV: title,url,snippet,location)')
    .requiredOption('-i, --input <path>', 'Input CSV file path')
    .option('--json', 'Print JSON instead of the table')
    .option('--csv <path>', 'Also write the ranked leads as CSV')
    .action(async (options: { input: string; json?: boolean; csv?: string }) => {
        try {
            const leads = await readLeadsCsv(path.resolve(options.input));
            const results = Pipeline.scoreLeads(leads);

            if (options.json) {
                console.log(JSON.stringify(ReportFormatter.sortLeads(results), null, 2));
            } else {
                console.log(ReportFormatter.formatLeadTable(results));
            }

            if (options.csv) {
                const saved = await new LeadCsvSink(path.resolve(options.csv)).write(ReportFormatter.sortLeads(results));
                console.error(`\n📁 Saved: ${saved}`);
            }
        } catch (e) {
            fail(e);
        }
    });

program.parseAsync(process.argv).catch(fail);
