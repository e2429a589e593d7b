import { IDashboardRenderer } from '../../domain/ports/IDashboardRenderer';
import { DashboardArtifact, FundingEvent, Person, StructuredRecord } from '../../domain/entities/CompanyIntel';
import { PermanentError } from '../../domain/errors/PipelineErrors';

const NOT_DISCLOSED = 'Not disclosed.';

type VariantTemplate = (record: StructuredRecord) => string[];

/**
 * Deterministic markdown dashboards. `structured` is the full investor view, `brief` a summary.
 */
export class MarkdownDashboardRenderer implements IDashboardRenderer {
    readonly resourceKey = 'markdown-renderer';

    private readonly templates: Record<string, VariantTemplate> = {
        structured: record => this.renderStructured(record),
        brief: record => this.renderBrief(record),
    };

    get supportedVariants(): string[] {
        return Object.keys(this.templates);
    }

    async render(record: StructuredRecord, variant: string): Promise<DashboardArtifact> {
        const template = this.templates[variant];
        if (!template) {
            throw new PermanentError(`Unsupported dashboard variant "${variant}"`, 'UNSUPPORTED_VARIANT', {
                variant,
                supported: this.supportedVariants,
            });
        }

        return {
            variant,
            format: 'markdown',
            content: template(record).join('\n'),
        };
    }

    private renderStructured(record: StructuredRecord): string[] {
        const lines: string[] = [`# ${displayName(record)} Investor Dashboard`, ''];

        lines.push('## Company Overview');
        lines.push(`- **Legal name:** ${record.legalName ?? NOT_DISCLOSED}`);
        lines.push(`- **Website:** ${record.website ?? NOT_DISCLOSED}`);
        lines.push(`- **Founded:** ${record.foundedYear ?? NOT_DISCLOSED}`);
        lines.push(`- **Headquarters:** ${record.headquarters ?? NOT_DISCLOSED}`);
        lines.push('', record.description ?? NOT_DISCLOSED, '');

        lines.push('## Funding & Investor Profile');
        lines.push(`- **Total raised:** ${record.totalRaisedUsd ? formatUsd(record.totalRaisedUsd) : NOT_DISCLOSED}`);
        lines.push(...listOrNotDisclosed(record.fundingEvents.map(formatFundingEvent)), '');

        lines.push('## Leadership & Founders');
        lines.push('### Founders');
        lines.push(...listOrNotDisclosed(record.founders.map(formatPerson)));
        lines.push('### Leadership');
        lines.push(...listOrNotDisclosed(record.leadership.map(formatPerson)), '');

        lines.push('## Products');
        lines.push(
            ...listOrNotDisclosed(
                record.products.map(p => (p.description ? `**${p.name}**: ${p.description}` : `**${p.name}**`))
            ),
            ''
        );

        lines.push('## Growth Momentum');
        lines.push(
            ...listOrNotDisclosed(
                record.metrics.map(m => `${m.label}: ${m.value}${m.asOf ? ` (as of ${m.asOf})` : ''}`)
            ),
            ''
        );

        lines.push('## Visibility & Market Sentiment');
        lines.push(...listOrNotDisclosed(record.mentions.map(m => `${m.source}: ${m.headline}`)), '');

        lines.push('## Disclosure Gaps');
        lines.push(...listOrNone(disclosureGaps(record)));

        return lines;
    }

    private renderBrief(record: StructuredRecord): string[] {
        return [
            `# ${displayName(record)}: Brief`,
            '',
            record.description ?? NOT_DISCLOSED,
            '',
            `- **Founded:** ${record.foundedYear ?? NOT_DISCLOSED}`,
            `- **Total raised:** ${record.totalRaisedUsd ? formatUsd(record.totalRaisedUsd) : NOT_DISCLOSED}`,
            `- **Funding rounds:** ${record.fundingEvents.length}`,
            `- **Team:** ${record.leadership.length} leaders, ${record.founders.length} founders`,
            `- **Products:** ${record.products.length > 0 ? record.products.map(p => p.name).join(', ') : NOT_DISCLOSED}`,
        ];
    }
}

/**
 * $25000000 -> "$25.0M", $1200000000 -> "$1.2B", smaller amounts with thousands separators.
 */
export function formatUsd(amount: number): string {
    if (amount >= 1e9) return `$${(amount / 1e9).toFixed(1)}B`;
    if (amount >= 1e6) return `$${(amount / 1e6).toFixed(1)}M`;
    return `$${Math.round(amount).toLocaleString('en-US')}`;
}

function displayName(record: StructuredRecord): string {
    return record.legalName ?? record.subjectKey;
}

function formatFundingEvent(event: FundingEvent): string {
    let line = event.round;
    if (event.amountUsd) line += `: ${formatUsd(event.amountUsd)}`;
    if (event.date) line += ` (${event.date})`;
    if (event.investors && event.investors.length > 0) line += `, investors: ${event.investors.join(', ')}`;
    return line;
}

function formatPerson(person: Person): string {
    return person.title ? `${person.name}, ${person.title}` : person.name;
}

function disclosureGaps(record: StructuredRecord): string[] {
    const gaps: string[] = [];
    if (!record.legalName) gaps.push('Legal name');
    if (!record.foundedYear) gaps.push('Founding year');
    if (!record.headquarters) gaps.push('Headquarters');
    if (!record.totalRaisedUsd) gaps.push('Total funding');
    if (record.fundingEvents.length === 0) gaps.push('Funding rounds');
    if (record.founders.length === 0) gaps.push('Founders');
    if (record.leadership.length === 0) gaps.push('Leadership team');
    if (record.products.length === 0) gaps.push('Products');
    return gaps;
}

function listOrNotDisclosed(items: string[]): string[] {
    return items.length > 0 ? items.map(item => `- ${item}`) : [NOT_DISCLOSED];
}

function listOrNone(items: string[]): string[] {
    return items.length > 0 ? items.map(item => `- ${item}`) : ['None'];
}
