import { PipelineStep, RunContext } from '../PipelineInfrastructure';
import { IPageFetcher } from '../../../domain/ports/IPageFetcher';
import { ResilientExecutor } from '../../services/ResilientExecutor';

export class FetchStep implements PipelineStep {
    readonly name = 'Fetch';
    readonly stage = 'FETCHING' as const;

    constructor(
        private readonly fetcher: IPageFetcher,
        private readonly executor: ResilientExecutor,
        private readonly timeoutMs: number
    ) { }

    async execute(context: RunContext): Promise<RunContext> {
        const { runId, subjectKey, signal } = context;
        const resourceKey = this.fetcher.resourceKey(subjectKey);

        console.log(`[${runId}] Fetching pages for ${subjectKey} from ${resourceKey}...`);

        const bundle = await this.executor.execute(
            {
                stage: this.stage,
                resourceKey,
                operationKey: `fetch:${resourceKey}`,
                timeoutMs: this.timeoutMs,
                signal,
            },
            attemptSignal => this.fetcher.fetch(subjectKey, attemptSignal)
        );

        console.log(`[${runId}] Fetched ${bundle.pages.length} pages`);
        return { ...context, bundle };
    }
}
