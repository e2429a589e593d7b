import { PipelineStep, RunContext } from '../PipelineInfrastructure';
import { IDashboardRenderer } from '../../../domain/ports/IDashboardRenderer';
import { PermanentError } from '../../../domain/errors/PipelineErrors';
import { ResilientExecutor } from '../../services/ResilientExecutor';

export class RenderStep implements PipelineStep {
    readonly name = 'Render';
    readonly stage = 'RENDERING' as const;

    constructor(
        private readonly renderer: IDashboardRenderer,
        private readonly executor: ResilientExecutor,
        private readonly timeoutMs: number
    ) { }

    async execute(context: RunContext): Promise<RunContext> {
        const { runId, record, variant, signal } = context;

        if (!record) throw new PermanentError('Structured record required for rendering', 'MISSING_INPUT');

        console.log(`[${runId}] Rendering ${variant} dashboard...`);

        const resourceKey = this.renderer.resourceKey;
        const artifact = await this.executor.execute(
            {
                stage: this.stage,
                resourceKey,
                operationKey: `render:${resourceKey}`,
                timeoutMs: this.timeoutMs,
                signal,
            },
            attemptSignal => this.renderer.render(record, variant, attemptSignal)
        );

        return { ...context, artifact };
    }
}
