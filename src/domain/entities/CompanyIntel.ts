/**
 * Data flowing between pipeline stages.
 * Collaborators own how these are produced; the orchestrator only moves them along.
 */

export interface FetchedPage {
    url: string;
    title?: string;
    text: string;
}

export interface PageBundle {
    subjectKey: string;
    website: string;
    pages: FetchedPage[];
    fetchedAt: string;
}

export interface FundingEvent {
    round: string;
    amountUsd?: number;
    date?: string;
    investors?: string[];
}

export interface Person {
    name: string;
    title?: string;
}

export interface Product {
    name: string;
    description?: string;
}

export interface MetricSnapshot {
    label: string;
    value: string;
    asOf?: string;
}

export interface Mention {
    source: string;
    headline: string;
    url?: string;
}

export interface StructuredRecord {
    subjectKey: string;
    legalName?: string;
    website?: string;
    foundedYear?: number;
    description?: string;
    headquarters?: string;
    totalRaisedUsd?: number;
    fundingEvents: FundingEvent[];
    leadership: Person[];
    founders: Person[];
    products: Product[];
    metrics: MetricSnapshot[];
    mentions: Mention[];
}

export interface ValidationReport {
    score: number;
    maxScore: number;
    issues: string[];
}

export type QualityTag = 'high' | 'medium' | 'low';

export interface DashboardArtifact {
    variant: string;
    format: 'markdown';
    content: string;
}

/**
 * What a successful run stores in the cache.
 */
export interface DashboardResult {
    subjectKey: string;
    companyId: string;
    variant: string;
    artifact: DashboardArtifact;
    generatedAt: string;
    qualityTag: QualityTag;
    validation: ValidationReport;
    metadata: {
        pagesFetched: number;
        durationMs: number;
        cacheStrategy: string;
    };
}

export function qualityTagForScore(score: number): QualityTag {
    if (score >= 80) return 'high';
    if (score >= 50) return 'medium';
    return 'low';
}

/**
 * Normalizes a subject name into the id used in cache keys ("Acme Co." -> "acme_co").
 */
export function toCompanyId(subjectKey: string): string {
    return subjectKey.trim().toLowerCase().replace(/\s+/g, '_').replace(/\./g, '');
}

/**
 * Shape check for dashboard results read back from durable storage.
 */
export function isDashboardResult(value: unknown): value is DashboardResult {
    if (typeof value !== 'object' || value === null) return false;
    const candidate: Record<string, unknown> = { ...value };
    const artifact = candidate.artifact;
    return (
        typeof candidate.subjectKey === 'string' &&
        typeof candidate.variant === 'string' &&
        typeof candidate.generatedAt === 'string' &&
        typeof artifact === 'object' &&
        artifact !== null &&
        'content' in artifact &&
        typeof artifact.content === 'string'
    );
}
