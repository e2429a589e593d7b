import fs from 'fs';
import axios from 'axios';
import * as cheerio from 'cheerio';
import { IPageFetcher } from '../../domain/ports/IPageFetcher';
import { FetchedPage, PageBundle } from '../../domain/entities/CompanyIntel';
import { PermanentError, fromHttpError } from '../../domain/errors/PipelineErrors';

export interface HttpPageFetcherOptions {
    /** Subject name -> website URL */
    subjects?: Record<string, string>;
    /** Per-request timeout in milliseconds (default: 10000) */
    timeout?: number;
    /**
     * Time one fetch may spend across all its requests. Subpages are skipped once it is spent
     * and the pages gathered so far are returned. Unbounded by default.
     */
    budgetMs?: number;
    userAgent?: string;
    /** Subpages fetched best effort after the homepage */
    subpagePaths?: string[];
    /** Page text is truncated to this many characters (default: 8000) */
    maxCharsPerPage?: number;
}

const DEFAULT_SUBPAGES = ['/about', '/team', '/company', '/careers', '/blog', '/news'];

/**
 * Page fetcher using axios + cheerio.
 * The homepage must load; subpages that fail are skipped.
 */
export class HttpPageFetcher implements IPageFetcher {
    private readonly subjects: Map<string, string>;
    private readonly timeout: number;
    private readonly budgetMs: number;
    private readonly userAgent: string;
    private readonly subpagePaths: string[];
    private readonly maxCharsPerPage: number;

    constructor(options?: HttpPageFetcherOptions) {
        this.subjects = new Map(
            Object.entries(options?.subjects ?? {}).map(([name, url]) => [name.trim().toLowerCase(), url])
        );
        this.timeout = options?.timeout ?? 10000;
        this.budgetMs = options?.budgetMs ?? Infinity;
        this.userAgent = options?.userAgent ?? 'LiveIntelBot/1.0';
        this.subpagePaths = options?.subpagePaths ?? DEFAULT_SUBPAGES;
        this.maxCharsPerPage = options?.maxCharsPerPage ?? 8000;
    }

    resourceKey(subjectKey: string): string {
        return new URL(this.resolveWebsite(subjectKey)).hostname;
    }

    async fetch(subjectKey: string, signal?: AbortSignal): Promise<PageBundle> {
        const website = this.resolveWebsite(subjectKey);
        const origin = new URL(website).origin;
        const deadline = Date.now() + this.budgetMs;

        let homepage: string;
        try {
            homepage = await this.get(website, Math.min(this.timeout, this.budgetMs), signal);
        } catch (error) {
            throw fromHttpError(error, `Fetching ${website}`);
        }

        const pages: FetchedPage[] = [this.toPage(website, homepage)];

        for (const path of this.subpagePaths) {
            if (signal?.aborted) break;

            const remainingMs = deadline - Date.now();
            if (remainingMs <= 0) {
                console.warn(`[HttpPageFetcher] ${subjectKey}: fetch budget spent, skipping remaining subpages`);
                break;
            }

            const url = `${origin}${path}`;
            const html = await this.getSubpage(url, Math.min(this.timeout, remainingMs), signal);
            if (html) {
                pages.push(this.toPage(url, html));
            }
        }

        console.log(`[HttpPageFetcher] ${subjectKey}: fetched ${pages.length} pages from ${origin}`);

        return {
            subjectKey,
            website,
            pages,
            fetchedAt: new Date().toISOString(),
        };
    }

    /**
     * Known subjects map to their configured website; otherwise the subject itself must be a
     * URL or a bare domain.
     */
    resolveWebsite(subjectKey: string): string {
        const known = this.subjects.get(subjectKey.trim().toLowerCase());
        if (known) return known;

        const candidate = subjectKey.trim();
        if (this.isValidUrl(candidate)) return candidate;
        if (/^[a-z0-9-]+(\.[a-z0-9-]+)+$/i.test(candidate)) return `https://${candidate}`;

        throw new PermanentError(`No website known for subject "${subjectKey}"`, 'UNKNOWN_SUBJECT', {
            subjectKey,
        });
    }

    private async get(url: string, timeout: number, signal?: AbortSignal): Promise<string> {
        const response = await axios.get<unknown>(url, {
            headers: {
                'User-Agent': this.userAgent,
                'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
                'Accept-Language': 'en-US,en;q=0.5',
            },
            timeout,
            maxRedirects: 5,
            responseType: 'text',
            signal,
        });

        if (typeof response.data !== 'string') {
            throw new PermanentError(`Unexpected response body from ${url}`, 'INVALID_RESPONSE');
        }
        return response.data;
    }

    /**
     * Fetches a subpage with error tolerance (returns null on failure).
     */
    private async getSubpage(url: string, timeout: number, signal?: AbortSignal): Promise<string | null> {
        try {
            return await this.get(url, timeout, signal);
        } catch {
            return null;
        }
    }

    private toPage(url: string, html: string): FetchedPage {
        const $ = cheerio.load(html);
        const title = $('title').first().text().trim();

        $('script, style, noscript, iframe, nav, footer, aside, button, input, textarea, select').remove();
        $('[class*="modal"], [id*="modal"], [class*="cookie"], [id*="cookie"], [class*="consent"], [id*="consent"]').remove();

        const text = $('body').text().replace(/\s+/g, ' ').trim();

        return {
            url,
            ...(title ? { title } : {}),
            text: text.substring(0, this.maxCharsPerPage),
        };
    }

    private isValidUrl(url: string): boolean {
        try {
            const parsed = new URL(url);
            return parsed.protocol === 'http:' || parsed.protocol === 'https:';
        } catch {
            return false;
        }
    }
}

/**
 * Reads the subject directory (a JSON object of name -> URL). A missing file means no
 * known subjects.
 */
export function loadSubjectDirectory(filePath: string): Record<string, string> {
    if (!fs.existsSync(filePath)) {
        console.warn(`[HttpPageFetcher] Subjects file not found at ${filePath}, only URLs will resolve`);
        return {};
    }

    const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
        throw new Error(`Subjects file ${filePath} must contain a JSON object`);
    }

    const subjects: Record<string, string> = {};
    for (const [name, url] of Object.entries(parsed)) {
        if (typeof url === 'string') {
            subjects[name] = url;
        } else {
            console.warn(`[HttpPageFetcher] Ignoring subject "${name}": website must be a string`);
        }
    }
    return subjects;
}
