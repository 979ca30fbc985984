import * as cheerio from 'cheerio';
import type { RawPosting } from '../types.js';
import { collapse, firstNonEmpty, type BoardSurface, type PostingExtractor } from './jobBoard.js';

const BASE = 'https://www.linkedin.com';

const CARD = '.base-search-card, .job-search-card';
const TITLE = ['.base-search-card__title', 'h3'];
const COMPANY = ['.base-search-card__subtitle a', '.base-search-card__subtitle', 'h4'];
const LOCATION = ['.job-search-card__location', '.base-search-card__metadata span'];
const LINK = ['a.base-card__full-link', 'a[href*="/jobs/view/"]'];
const DESCRIPTION = ['.show-more-less-html__markup', '.description__text', '.decorated-job-posting__details'];

function jobIdFrom(urn: string | undefined, href: string): string | undefined {
    const fromUrn = urn?.match(/jobPosting:(\d+)/)?.[1];
    if (fromUrn) return fromUrn;
    return href.match(/[-/](\d{6,})(?:[/?]|$)/)?.[1];
}

export const linkedInExtractor: PostingExtractor = {
    extract(html) {
        const $ = cheerio.load(html);
        return $(CARD).toArray().flatMap((el): RawPosting[] => {
            const card = $(el);
            const title = firstNonEmpty(TITLE.map(s => card.find(s).first().text()));
            const href = firstNonEmpty(LINK.map(s => card.find(s).first().attr('href')));
            if (!title || !href) return [];
            const boardJobId = jobIdFrom(card.attr('data-entity-urn') ?? card.find('[data-entity-urn]').first().attr('data-entity-urn'), href);
            let url: string;
            try {
                const u = new URL(href, BASE);
                url = boardJobId ? `${BASE}/jobs/view/${boardJobId}` : `${u.origin}${u.pathname}`;
            } catch {
                return [];
            }
            return [{
                boardJobId,
                title,
                company: firstNonEmpty(COMPANY.map(s => card.find(s).first().text())),
                location: firstNonEmpty(LOCATION.map(s => card.find(s).first().text())),
                url,
                snippet: collapse(card.find('.job-search-card__snippet').first().text())
            }];
        });
    }
};

export function extractLinkedInDescription(html: string): string | null {
    const $ = cheerio.load(html);
    for (const selector of DESCRIPTION) {
        const text = collapse($(selector).first().text());
        if (text) return text;
    }
    return null;
}

export const linkedInSurface: BoardSurface = {
    id: 'linkedin',
    searchUrl: `${BASE}/jobs-guest/jobs/api/seeMoreJobPostings/search`,
    pageSize: 25,
    // f_JT=I: internship job type
    searchParams: (query, start) => ({ keywords: query.keywords, location: query.location, f_JT: 'I', start }),
    extractor: linkedInExtractor,
    detail: {
        url: id => `${BASE}/jobs-guest/jobs/api/jobPosting/${id}`,
        extract: extractLinkedInDescription
    }
};
