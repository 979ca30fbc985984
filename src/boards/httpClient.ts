import axios, { type AxiosInstance } from 'axios';
import { safeCall } from '../helpers.js';

/**
 * Fetches a rendered result page. The only seam between the boards and the network.
 */
export interface HtmlFetcher {
    getHtml(url: string, params?: Record<string, string | number>): Promise<string>;
}

export const BROWSER_HEADERS = {
    'User-Agent': 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124 Safari/537.36',
    'Accept-Language': 'en-US,en;q=0.9',
    Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8'
};

const RETRYABLE_STATUS = [429, 500, 502, 503, 504];

export interface HttpClientOptions {
    timeoutMs?: number;
    retries?: number;
    backoffMs?: number;
}

export class HttpClient implements HtmlFetcher {
    private http: AxiosInstance;
    private retries: number;
    private backoffMs: number;

    constructor({ timeoutMs = 12000, retries = 2, backoffMs = 500 }: HttpClientOptions = {}) {
        this.http = axios.create({ timeout: timeoutMs, headers: BROWSER_HEADERS, responseType: 'text' });
        this.retries = retries;
        this.backoffMs = backoffMs;
    }

    async getHtml(url: string, params: Record<string, string | number> = {}): Promise<string> {
        return safeCall(`GET ${url}`, async () => (await this.http.get<string>(url, { params })).data, {
            retries: this.retries,
            baseDelayMs: this.backoffMs,
            retryOn: ({ status }) => status === null || RETRYABLE_STATUS.includes(status)
        });
    }
}
