import axios, { AxiosError, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { CrawlError } from '../errors.js';
import { makePosting } from '../testUtils.js';
import { HttpClient, type HtmlFetcher } from './httpClient.js';
import { indeedExtractor, indeedSurface } from './indeed.js';
import { HtmlJobBoard, postingId, type BoardSurface } from './jobBoard.js';
import { linkedInExtractor, linkedInSurface } from './linkedin.js';

class FakeFetcher implements HtmlFetcher {
    calls: Array<{ url: string; params?: Record<string, string | number> }> = [];
    private pages: (url: string, params?: Record<string, string | number>) => string;

    constructor(pages: (url: string, params?: Record<string, string | number>) => string) {
        this.pages = pages;
    }

    async getHtml(url: string, params?: Record<string, string | number>) {
        this.calls.push({ url, params });
        return this.pages(url, params);
    }
}

const LINKEDIN_HTML = `
<ul>
  <li>
    <div class="base-card base-search-card job-search-card" data-entity-urn="urn:li:jobPosting:3812345678">
      <a class="base-card__full-link" href="https://www.linkedin.com/jobs/view/data-intern-at-acme-3812345678?refId=abc&amp;trackingId=xyz"></a>
      <div class="base-search-card__info">
        <h3 class="base-search-card__title">  Data Science Intern </h3>
        <h4 class="base-search-card__subtitle"><a href="https://www.linkedin.com/company/acme">Acme Corp</a></h4>
        <div class="base-search-card__metadata"><span class="job-search-card__location">Dallas, TX</span></div>
      </div>
    </div>
  </li>
  <li><div class="base-search-card"><h3 class="base-search-card__title"></h3></div></li>
  <li>
    <div class="base-search-card">
      <a class="base-card__full-link" href="https://www.linkedin.com/jobs/view/ml-intern-at-beta-3899999999/?position=2"></a>
      <h3 class="base-search-card__title">ML Intern</h3>
      <h4 class="base-search-card__subtitle">Beta</h4>
      <span class="job-search-card__location">Remote</span>
    </div>
  </li>
</ul>`;

const INDEED_HTML = `
<div class="job_seen_beacon">
  <h2 class="jobTitle"><a class="jcs-JobTitle" data-jk="a1b2c3d4e5f60718" href="/rc/clk?jk=a1b2c3d4e5f60718&amp;from=serp"><span title="Software Intern">Software Intern</span></a></h2>
  <span data-testid="company-name">Initech</span>
  <div data-testid="text-location">Irving, TX 75039</div>
  <div class="job-snippet"><ul><li>Write code.</li></ul></div>
</div>
<div class="job_seen_beacon"><h2 class="jobTitle"></h2></div>
<div class="job_seen_beacon">
  <h2 class="jobTitle"><a class="jcs-JobTitle" href="/rc/clk?jk=ffee0011&amp;from=serp"><span title="QA Intern">QA Intern</span></a></h2>
  <span data-testid="company-name">Globex</span>
  <div data-testid="text-location">Remote</div>
</div>`;

describe('linkedInExtractor', () => {
    it('reads the result cards and skips the ones without a title', () => {
        expect(linkedInExtractor.extract(LINKEDIN_HTML)).toEqual([
            {
                boardJobId: '3812345678',
                title: 'Data Science Intern',
                company: 'Acme Corp',
                location: 'Dallas, TX',
                url: 'https://www.linkedin.com/jobs/view/3812345678',
                snippet: ''
            },
            {
                boardJobId: '3899999999',
                title: 'ML Intern',
                company: 'Beta',
                location: 'Remote',
                url: 'https://www.linkedin.com/jobs/view/3899999999',
                snippet: ''
            }
        ]);
    });

    it('returns nothing for a page without cards', () => {
        expect(linkedInExtractor.extract('<html><body>No jobs</body></html>')).toEqual([]);
    });
});

describe('indeedExtractor', () => {
    it('reads the result cards and builds canonical view URLs', () => {
        expect(indeedExtractor.extract(INDEED_HTML)).toEqual([
            {
                boardJobId: 'a1b2c3d4e5f60718',
                title: 'Software Intern',
                company: 'Initech',
                location: 'Irving, TX 75039',
                url: 'https://www.indeed.com/viewjob?jk=a1b2c3d4e5f60718',
                snippet: 'Write code.'
            },
            {
                boardJobId: 'ffee0011',
                title: 'QA Intern',
                company: 'Globex',
                location: 'Remote',
                url: 'https://www.indeed.com/viewjob?jk=ffee0011',
                snippet: ''
            }
        ]);
    });

    it('adds "internship" to queries that do not already ask for interns', () => {
        expect(indeedSurface.searchParams({ keywords: 'data analyst', location: 'United States' }, 10))
            .toEqual({ q: 'data analyst internship', l: 'United States', start: 10 });
        expect(indeedSurface.searchParams({ keywords: 'data intern', location: 'United States' }, 0).q).toBe('data intern');
    });
});

describe('postingId', () => {
    const raw = { title: 'Intern', company: 'Acme', location: 'Dallas, TX', url: '', snippet: '' };

    it('prefers the board job id', () => {
        expect(postingId('linkedin', { ...raw, boardJobId: '1', url: 'https://x.test/a' })).toBe('linkedin:1');
    });

    it('falls back to the URL without its query string', () => {
        expect(postingId('indeed', { ...raw, url: 'https://x.test/a/b/?q=1' })).toBe('https://x.test/a/b');
    });

    it('falls back to a hash of title, company and location', () => {
        const id = postingId('indeed', raw);
        expect(id).toMatch(/^indeed#[a-f0-9]{24}$/);
        expect(postingId('indeed', { ...raw, title: ' INTERN ' })).toBe(id);
    });
});

describe('HtmlJobBoard', () => {
    // Pages are comma separated job ids, two per page.
    const surface: BoardSurface = {
        id: 'indeed',
        searchUrl: 'https://board.test/search',
        pageSize: 2,
        searchParams: (query, start) => ({ q: query.keywords, start }),
        extractor: {
            extract: html => html.split(',').filter(Boolean).map(id => ({
                boardJobId: id, title: `Job ${id}`, company: 'Acme', location: 'Dallas, TX', url: `https://board.test/${id}`, snippet: ''
            }))
        }
    };
    const query = { keywords: 'intern', location: 'Dallas' };

    beforeEach(() => {
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    });

    it('pages until the limit is reached', async () => {
        const pages: Record<number, string> = { 0: '1,2', 2: '3,4', 4: '5,6', 6: '7,8' };
        const fetcher = new FakeFetcher((_, params) => pages[Number(params?.start)] ?? '');
        const results = await new HtmlJobBoard(fetcher, surface).search(query, 5);

        expect(results.map(r => r.boardJobId)).toEqual(['1', '2', '3', '4', '5']);
        expect(fetcher.calls.map(c => c.params)).toEqual([{ q: 'intern', start: 0 }, { q: 'intern', start: 2 }, { q: 'intern', start: 4 }]);
    });

    it('stops when a page brings nothing new', async () => {
        const fetcher = new FakeFetcher(() => '1,2');
        const results = await new HtmlJobBoard(fetcher, surface).search(query, 10);

        expect(results.map(r => r.boardJobId)).toEqual(['1', '2']);
        expect(fetcher.calls).toHaveLength(2);
    });

    it('throws a CrawlError when the first page fails', async () => {
        const fetcher = new FakeFetcher(() => { throw new Error('403'); });
        await expect(new HtmlJobBoard(fetcher, surface).search(query, 10)).rejects.toBeInstanceOf(CrawlError);
    });

    it('keeps what it has when a later page fails', async () => {
        const fetcher = new FakeFetcher((_, params) => {
            if (params?.start === 0) return '1,2';
            throw new Error('timeout');
        });
        const results = await new HtmlJobBoard(fetcher, surface).search(query, 10);
        expect(results.map(r => r.boardJobId)).toEqual(['1', '2']);
    });

    it('fetches the full description from the detail page', async () => {
        const fetcher = new FakeFetcher(() => '<div class="show-more-less-html__markup"> Great\n   role </div>');
        const board = new HtmlJobBoard(fetcher, linkedInSurface);

        await expect(board.fetchDescription(makePosting({ id: 'linkedin:3812345678' }))).resolves.toBe('Great role');
        expect(fetcher.calls[0].url).toBe('https://www.linkedin.com/jobs-guest/jobs/api/jobPosting/3812345678');
    });

    it('has no description to fetch for postings without a board id', async () => {
        const fetcher = new FakeFetcher(() => '');
        const board = new HtmlJobBoard(fetcher, linkedInSurface);

        await expect(board.fetchDescription(makePosting({ id: 'https://jobs.test/1' }))).resolves.toBeNull();
        expect(fetcher.calls).toHaveLength(0);
    });
});

describe('HttpClient', () => {
    const create = axios.create.bind(axios);
    let statuses: number[];
    let seen: InternalAxiosRequestConfig[];

    function respond(config: InternalAxiosRequestConfig, status: number): AxiosResponse<string> {
        return { data: `<p>${status}</p>`, status, statusText: String(status), headers: {}, config };
    }

    beforeEach(() => {
        seen = [];
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        vi.spyOn(console, 'error').mockImplementation(() => undefined);
        vi.spyOn(axios, 'create').mockImplementation(defaults => create({
            ...defaults,
            adapter: async config => {
                seen.push(config);
                const status = statuses.shift() ?? 200;
                const response = respond(config, status);
                if (status >= 400) throw new AxiosError(`status ${status}`, 'ERR_BAD_RESPONSE', config, undefined, response);
                return response;
            }
        }));
    });
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('sends the query parameters and browser headers', async () => {
        statuses = [200];
        await expect(new HttpClient().getHtml('https://board.test/search', { q: 'intern', start: 10 })).resolves.toBe('<p>200</p>');
        expect(seen[0].params).toEqual({ q: 'intern', start: 10 });
        expect(seen[0].headers.get('Accept-Language')).toBe('en-US,en;q=0.9');
    });

    it('retries server errors', async () => {
        statuses = [503, 502, 200];
        await expect(new HttpClient({ retries: 2, backoffMs: 0 }).getHtml('https://board.test/search')).resolves.toBe('<p>200</p>');
        expect(seen).toHaveLength(3);
    });

    it('does not retry client errors', async () => {
        statuses = [403];
        await expect(new HttpClient({ retries: 2, backoffMs: 0 }).getHtml('https://board.test/search')).rejects.toBeInstanceOf(AxiosError);
        expect(seen).toHaveLength(1);
    });
});
