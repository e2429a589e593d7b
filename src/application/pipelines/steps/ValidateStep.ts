import { PipelineStep, RunContext } from '../PipelineInfrastructure';
import { IRecordValidator } from '../../../domain/ports/IRecordValidator';
import { PermanentError } from '../../../domain/errors/PipelineErrors';

/**
 * Local scoring only: no rate limit, breaker or retry.
 */
export class ValidateStep implements PipelineStep {
    readonly name = 'Validate';
    readonly stage = 'VALIDATING' as const;

    constructor(private readonly validator: IRecordValidator) { }

    async execute(context: RunContext): Promise<RunContext> {
        const { runId, record } = context;

        if (!record) throw new PermanentError('Structured record required for validation', 'MISSING_INPUT');

        const validation = this.validator.validate(record);
        console.log(`[${runId}] Validation score ${validation.score}/${validation.maxScore} (${validation.issues.length} issues)`);

        return { ...context, validation };
    }
}
