import * as cheerio from 'cheerio';

export interface PageMeta {
    title: string;
    description: string;
}

const TITLE_MAX = 120;
const DESCRIPTION_MAX = 200;

export class PageExtractor {

    /**
     * Reads title and description from raw markup.
     * `fallbackTitle` is used when the page has no usable <title>.
     */
    static extract(html: string, fallbackTitle: string): PageMeta {
        if (!html) return { title: fallbackTitle, description: '' };

        const $ = cheerio.load(html);

        const title = $('title').first().text().replace(/\s+/g, ' ').trim();
        const description = ($('meta[name="description"]').attr('content') || '').trim();

        return {
            title: title ? title.substring(0, TITLE_MAX) : fallbackTitle,
            description: description.substring(0, DESCRIPTION_MAX),
        };
    }
}
