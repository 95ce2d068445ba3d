import winston from 'winston';
import 'winston-daily-rotate-file';
import { getConfig } from '../../config';
import { OpportunityScorer } from '../scorer';
import type { LeadResult, SiteReport } from '../../types';

export enum ErrorCategory {
    NETWORK = 'NETWORK', // Timeout, DNS, connection refused
    PARSING = 'PARSING',
    VALIDATION = 'VALIDATION',
    AUTH = 'AUTH', // 401/403/429
    LOGIC = 'LOGIC',
}

export type LogMeta = Record<string, unknown>;

export class Logger {
    private logger: winston.Logger;

    constructor() {
        const config = getConfig();
        const fileTransports = config.system.log_dir
            ? [new winston.transports.DailyRotateFile({
                dirname: config.system.log_dir,
                filename: 'site-leads-%DATE%.log',
                datePattern: 'YYYY-MM-DD',
                zippedArchive: true,
                maxSize: '20m',
                maxFiles: '14d',
            })]
            : [];

        this.logger = winston.createLogger({
            level: config.system.log_level,
            silent: process.env.NODE_ENV === 'test',
            format: winston.format.combine(
                winston.format.timestamp(),
                winston.format.json()
            ),
            transports: [
                ...fileTransports,
                new winston.transports.Console({ format: winston.format.simple() }),
            ],
        });
    }

    info(message: string, meta?: LogMeta) {
        this.logger.info(message, meta);
    }

    warn(message: string, meta?: LogMeta) {
        this.logger.warn(message, meta);
    }

    error(message: string, meta?: LogMeta) {
        this.logger.error(message, meta);
    }

    debug(message: string, meta?: LogMeta) {
        this.logger.debug(message, meta);
    }

    static categorizeError(error: Error): ErrorCategory {
        const msg = error.message.toLowerCase();

        if (msg.includes('timeout') || msg.includes('econnrefused') || msg.includes('enotfound') || msg.includes('socket') || msg.includes('econnreset')) {
            return ErrorCategory.NETWORK;
        }
        if (msg.includes('401') || msg.includes('403') || msg.includes('429') || msg.includes('rate limit')) {
            return ErrorCategory.AUTH;
        }
        if (msg.includes('parse') || msg.includes('unexpected token') || msg.includes('json')) {
            return ErrorCategory.PARSING;
        }
        if (msg.includes('validation') || msg.includes('invalid')) {
            return ErrorCategory.VALIDATION;
        }
        return ErrorCategory.LOGIC;
    }
}

let loggerInstance: Logger | null = null;

// Lazy so that tests can load a custom config before the first log line.
export const getLogger = (): Logger => {
    if (!loggerInstance) loggerInstance = new Logger();
    return loggerInstance;
};

export class Metrics {
    stats = {
        total: 0,
        hot: 0,
        warm: 0,
        cool: 0,
        unreachable: 0,
        no_website: 0,
        total_latency: 0,
    };

    recordSite(report: SiteReport, latencyMs: number) {
        this.stats.total++;
        if (report.result.status === 0) this.stats.unreachable++;
        this.stats.total_latency += latencyMs;
    }

    recordLead(result: LeadResult) {
        this.stats.total++;
        this.stats[OpportunityScorer.bucket(result.score)]++;
        if (!result.lead.url.trim()) this.stats.no_website++;
    }

    getSummary() {
        return {
            ...this.stats,
            avg_latency: this.stats.total > 0 ? Math.round(this.stats.total_latency / this.stats.total) : 0,
        };
    }
}
