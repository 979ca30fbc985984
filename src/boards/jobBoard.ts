import { CrawlError } from '../errors.js';
import { sha256 } from '../helpers.js';
import type { BoardId, JobPosting, RawPosting, SearchQuery } from '../types.js';
import type { HtmlFetcher } from './httpClient.js';

/**
 * Turns one result page into posting summaries. Cards that no longer parse are skipped, never fatal.
 */
export interface PostingExtractor {
    extract(html: string): RawPosting[];
}

/**
 * Everything board specific: where to search, how pages are numbered and how to read them.
 */
export interface BoardSurface {
    id: BoardId;
    searchUrl: string;
    pageSize: number;
    searchParams(query: SearchQuery, start: number): Record<string, string | number>;
    extractor: PostingExtractor;
    detail?: {
        url(boardJobId: string): string;
        extract(html: string): string | null;
    };
}

export interface JobBoard {
    readonly id: BoardId;
    search(query: SearchQuery, limit: number): Promise<RawPosting[]>;
    fetchDescription?(posting: JobPosting): Promise<string | null>;
}

export function collapse(text: string | undefined): string {
    return (text ?? '').replace(/\s+/g, ' ').trim();
}

export function firstNonEmpty(values: Array<string | undefined>): string {
    for (const v of values) {
        const c = collapse(v);
        if (c) return c;
    }
    return '';
}

/**
 * Stable identity of a posting across queries: the board's job id, else the URL without its query string,
 * else a hash of title, company and location.
 */
export function postingId(source: BoardId, raw: RawPosting): string {
    if (raw.boardJobId) return `${source}:${raw.boardJobId}`;
    if (raw.url) {
        try {
            const u = new URL(raw.url);
            return `${u.origin}${u.pathname}`.replace(/\/$/, '');
        } catch {
            // not a URL; fall through to the content hash
        }
    }
    return `${source}#${sha256([raw.title, raw.company, raw.location].map(s => s.toLowerCase().trim()).join('|')).slice(0, 24)}`;
}

export class HtmlJobBoard implements JobBoard {
    readonly id: BoardId;
    private fetcher: HtmlFetcher;
    private surface: BoardSurface;

    constructor(fetcher: HtmlFetcher, surface: BoardSurface) {
        this.id = surface.id;
        this.fetcher = fetcher;
        this.surface = surface;
    }

    /**
     * Pages through the results for `query` until `limit` postings are collected or a page adds nothing new.
     *
     * @throws {@link CrawlError} when the first page cannot be fetched. Later page failures end the search early.
     */
    async search(query: SearchQuery, limit: number): Promise<RawPosting[]> {
        const found: RawPosting[] = [];
        const seen = new Set<string>();
        const maxPages = Math.ceil(limit / this.surface.pageSize) + 1;
        for (let page = 0, start = 0; page < maxPages && found.length < limit; page++, start += this.surface.pageSize) {
            let html: string;
            try {
                html = await this.fetcher.getHtml(this.surface.searchUrl, this.surface.searchParams(query, start));
            } catch (err) {
                if (page === 0) throw new CrawlError(this.id, query.keywords, err);
                console.warn(`[crawl] ${this.id} page ${page + 1} for "${query.keywords}" failed; keeping ${found.length} results.`);
                break;
            }
            const fresh = this.surface.extractor.extract(html).filter(p => {
                const id = postingId(this.id, p);
                if (seen.has(id)) return false;
                seen.add(id);
                return true;
            });
            if (!fresh.length) break;
            found.push(...fresh);
        }
        return found.slice(0, limit);
    }

    async fetchDescription(posting: JobPosting): Promise<string | null> {
        const detail = this.surface.detail;
        const boardJobId = posting.id.startsWith(`${this.id}:`) ? posting.id.slice(this.id.length + 1) : null;
        if (!detail || !boardJobId) return null;
        return detail.extract(await this.fetcher.getHtml(detail.url(boardJobId)));
    }
}
