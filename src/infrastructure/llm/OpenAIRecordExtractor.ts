import Ajv from 'ajv';
import recordSchema from './structured-record.schema.json';
import { IRecordExtractor } from '../../domain/ports/IRecordExtractor';
import { PageBundle, StructuredRecord } from '../../domain/entities/CompanyIntel';
import { PermanentError } from '../../domain/errors/PipelineErrors';
import { OpenAIService } from './OpenAIService';
import { EXTRACTION_SYSTEM_PROMPT, EXTRACT_RECORD_PROMPT } from './Prompts';

interface ExtractedPerson {
    name: string;
    title?: string | null;
}

/**
 * Shape of the model's JSON answer after schema validation (arrays defaulted to []).
 */
interface ExtractedPayload {
    legalName?: string | null;
    website?: string | null;
    foundedYear?: number | null;
    description?: string | null;
    headquarters?: string | null;
    totalRaisedUsd?: number | null;
    fundingEvents: Array<{ round: string; amountUsd?: number | null; date?: string | null; investors?: string[] }>;
    leadership: ExtractedPerson[];
    founders: ExtractedPerson[];
    products: Array<{ name: string; description?: string | null }>;
    metrics: Array<{ label: string; value: string | number; asOf?: string | null }>;
    mentions: Array<{ source: string; headline: string; url?: string | null }>;
}

const ajv = new Ajv({ allErrors: true, useDefaults: true, allowUnionTypes: true });
const validatePayload = ajv.compile<ExtractedPayload>(recordSchema);

export interface OpenAIRecordExtractorOptions {
    temperature?: number;
    /** Total characters of page text sent to the model (default: 24000) */
    maxPromptChars?: number;
}

/**
 * Structured extraction via chat completions in JSON mode.
 * Output that is not JSON or does not match the record schema is a PermanentError.
 */
export class OpenAIRecordExtractor implements IRecordExtractor {
    readonly resourceKey: string;
    private readonly temperature: number;
    private readonly maxPromptChars: number;

    constructor(
        private readonly openAIService: OpenAIService,
        options?: OpenAIRecordExtractorOptions
    ) {
        this.resourceKey = openAIService.host;
        this.temperature = options?.temperature ?? 0.1;
        this.maxPromptChars = options?.maxPromptChars ?? 24000;
    }

    async extract(bundle: PageBundle, signal?: AbortSignal): Promise<StructuredRecord> {
        const prompt = EXTRACT_RECORD_PROMPT
            .replace('{{subject}}', bundle.subjectKey)
            .replace('{{website}}', bundle.website)
            .replace('{{pages}}', this.formatPages(bundle));

        const response = await this.openAIService.chatCompletion(prompt, EXTRACTION_SYSTEM_PROMPT, {
            jsonMode: true,
            temperature: this.temperature,
            signal,
        });

        const parsed = this.openAIService.parseJSON(response);
        if (!validatePayload(parsed)) {
            throw new PermanentError(
                `Extracted record does not match schema: ${ajv.errorsText(validatePayload.errors)}`,
                'SCHEMA_VIOLATION'
            );
        }

        const record = toStructuredRecord(bundle.subjectKey, parsed);
        console.log(
            `[LLM] Extracted ${bundle.subjectKey}: ${record.fundingEvents.length} funding events, ` +
            `${record.leadership.length} leaders, ${record.products.length} products`
        );
        return record;
    }

    private formatPages(bundle: PageBundle): string {
        const budget = Math.floor(this.maxPromptChars / Math.max(1, bundle.pages.length));
        return bundle.pages
            .map(page => `--- ${page.title ?? page.url} (${page.url}) ---\n${page.text.substring(0, budget)}`)
            .join('\n\n');
    }
}

function toStructuredRecord(subjectKey: string, payload: ExtractedPayload): StructuredRecord {
    const person = (p: ExtractedPerson) => ({ name: p.name, title: orUndefined(p.title) });

    return {
        subjectKey,
        legalName: orUndefined(payload.legalName),
        website: orUndefined(payload.website),
        foundedYear: orUndefined(payload.foundedYear),
        description: orUndefined(payload.description),
        headquarters: orUndefined(payload.headquarters),
        totalRaisedUsd: orUndefined(payload.totalRaisedUsd),
        fundingEvents: payload.fundingEvents.map(event => ({
            round: event.round,
            amountUsd: orUndefined(event.amountUsd),
            date: orUndefined(event.date),
            investors: event.investors ?? [],
        })),
        leadership: payload.leadership.map(person),
        founders: payload.founders.map(person),
        products: payload.products.map(product => ({
            name: product.name,
            description: orUndefined(product.description),
        })),
        metrics: payload.metrics.map(metric => ({
            label: metric.label,
            value: String(metric.value),
            asOf: orUndefined(metric.asOf),
        })),
        mentions: payload.mentions.map(mention => ({
            source: mention.source,
            headline: mention.headline,
            url: orUndefined(mention.url),
        })),
    };
}

function orUndefined<T>(value: T | null | undefined): T | undefined {
    return value ?? undefined;
}
