import { DashboardArtifact, StructuredRecord } from '../entities/CompanyIntel';

/**
 * Renders a record into a dashboard document. Must not mutate the record.
 */
export interface IDashboardRenderer {
    readonly resourceKey: string;

    render(record: StructuredRecord, variant: string, signal?: AbortSignal): Promise<DashboardArtifact>;
}
