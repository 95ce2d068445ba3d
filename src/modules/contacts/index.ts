import type { ContactSet } from '../../types';
import { getConfig } from '../../config';

// Starts only at a run boundary and bounds each part, so long runs without `@` stay linear
const EMAIL_PATTERN = /(?<![a-zA-Z0-9._%+-])[a-zA-Z0-9._%+-]{1,64}@[a-zA-Z0-9.-]{1,253}\.[a-zA-Z]{2,}/g;
// North American layout: (312) 555-0188, 312.555.0188, 3125550188
const PHONE_PATTERN = /\(?\d{3}\)?[-.\s]?\d{3}[-.\s]?\d{4}/g;

export class ContactExtractor {

    /**
     * Scans the full raw text (markup included) for emails and phones.
     * Exact-match dedupe, first-seen order, capped per kind.
     */
    static extract(text: string): ContactSet {
        const limit = getConfig().contacts.max_per_kind;
        return {
            emails: this.collect(text, EMAIL_PATTERN, limit),
            phones: this.collect(text, PHONE_PATTERN, limit),
        };
    }

    private static collect(text: string, pattern: RegExp, limit: number): string[] {
        const found: string[] = [];
        for (const match of text.matchAll(pattern)) {
            const value = match[0];
            if (!found.includes(value)) found.push(value);
            if (found.length >= limit) break;
        }
        return found;
    }
}
