import { PageBundle, StructuredRecord } from '../entities/CompanyIntel';

/**
 * Structured extraction port (usually an LLM).
 * Any consensus or multi-model logic is internal to the implementation.
 */
export interface IRecordExtractor {
    readonly resourceKey: string;

    extract(bundle: PageBundle, signal?: AbortSignal): Promise<StructuredRecord>;
}
