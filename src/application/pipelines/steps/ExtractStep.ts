import { PipelineStep, RunContext } from '../PipelineInfrastructure';
import { IRecordExtractor } from '../../../domain/ports/IRecordExtractor';
import { PermanentError } from '../../../domain/errors/PipelineErrors';
import { ResilientExecutor } from '../../services/ResilientExecutor';

export class ExtractStep implements PipelineStep {
    readonly name = 'Extract';
    readonly stage = 'EXTRACTING' as const;

    constructor(
        private readonly extractor: IRecordExtractor,
        private readonly executor: ResilientExecutor,
        private readonly timeoutMs: number
    ) { }

    async execute(context: RunContext): Promise<RunContext> {
        const { runId, bundle, signal } = context;

        if (!bundle) throw new PermanentError('Page bundle required for extraction', 'MISSING_INPUT');

        console.log(`[${runId}] Extracting structured record from ${bundle.pages.length} pages...`);

        const resourceKey = this.extractor.resourceKey;
        const record = await this.executor.execute(
            {
                stage: this.stage,
                resourceKey,
                operationKey: `extract:${resourceKey}`,
                timeoutMs: this.timeoutMs,
                signal,
            },
            attemptSignal => this.extractor.extract(bundle, attemptSignal)
        );

        return { ...context, record };
    }
}
