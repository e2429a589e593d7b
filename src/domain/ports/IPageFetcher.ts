import { PageBundle } from '../entities/CompanyIntel';

/**
 * Page fetcher port. How pages are discovered and rendered is up to the implementation.
 * May fail with TransientError or PermanentError.
 */
export interface IPageFetcher {
    /**
     * Rate-limit bucket for the subject, usually the remote hostname.
     */
    resourceKey(subjectKey: string): string;

    fetch(subjectKey: string, signal?: AbortSignal): Promise<PageBundle>;
}
