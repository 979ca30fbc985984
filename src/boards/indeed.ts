import * as cheerio from 'cheerio';
import type { RawPosting } from '../types.js';
import { firstNonEmpty, type BoardSurface, type PostingExtractor } from './jobBoard.js';

const BASE = 'https://www.indeed.com';

// Indeed has renamed its result markup several times; the first selector that matches anything wins.
const CARDS = ['.job_seen_beacon', 'td.resultContent', 'div.jobsearch-SerpJobCard'];
const TITLE = ['h2.jobTitle span[title]', 'h2.jobTitle a span', 'h2.jobTitle', '.jobTitle'];
const COMPANY = ['[data-testid="company-name"]', '.companyName', '.company'];
const LOCATION = ['[data-testid="text-location"]', '.companyLocation', '.location'];
const LINK = ['a.jcs-JobTitle', 'h2.jobTitle a', 'a[data-jk]'];
const SNIPPET = ['.job-snippet', '[data-testid="jobsnippet_footer"]', '.summary'];

export const indeedExtractor: PostingExtractor = {
    extract(html) {
        const $ = cheerio.load(html);
        const cardSelector = CARDS.find(s => $(s).length > 0);
        if (!cardSelector) return [];
        return $(cardSelector).toArray().flatMap((el): RawPosting[] => {
            const card = $(el);
            const title = firstNonEmpty(TITLE.map(s => card.find(s).first().text()));
            const link = LINK.map(s => card.find(s).first()).find(a => a.length > 0);
            const href = link?.attr('href') ?? '';
            const boardJobId = link?.attr('data-jk') ?? href.match(/[?&]jk=([a-f0-9]+)/i)?.[1];
            if (!title || (!href && !boardJobId)) return [];
            let url: string;
            try {
                url = boardJobId ? `${BASE}/viewjob?jk=${boardJobId}` : new URL(href, BASE).toString();
            } catch {
                return [];
            }
            return [{
                boardJobId,
                title,
                company: firstNonEmpty(COMPANY.map(s => card.find(s).first().text())),
                location: firstNonEmpty(LOCATION.map(s => card.find(s).first().text())),
                url,
                snippet: firstNonEmpty(SNIPPET.map(s => card.find(s).first().text()))
            }];
        });
    }
};

export const indeedSurface: BoardSurface = {
    id: 'indeed',
    searchUrl: `${BASE}/jobs`,
    pageSize: 10,
    searchParams: (query, start) => ({ q: /\bintern/i.test(query.keywords) ? query.keywords : `${query.keywords} internship`, l: query.location, start }),
    extractor: indeedExtractor
};
