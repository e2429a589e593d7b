import { IRecordValidator } from '../../domain/ports/IRecordValidator';
import { StructuredRecord, ValidationReport } from '../../domain/entities/CompanyIntel';

/**
 * Completeness score out of 100:
 * basics 20 (5 each), funding 30, team 20, products 15, signals 15.
 */
export class WeightedFieldValidator implements IRecordValidator {
    validate(record: StructuredRecord): ValidationReport {
        let score = 0;
        const issues: string[] = [];

        // Company basics
        if (record.legalName) score += 5;
        if (record.website) score += 5;
        if (record.foundedYear) score += 5;
        if (record.description) score += 5;

        // Funding
        if (record.totalRaisedUsd) score += 15;
        if (record.fundingEvents.length > 0) {
            score += 15;
        } else {
            issues.push('No funding events');
        }

        // Team
        if (record.leadership.length > 0) {
            score += 10;
        } else {
            issues.push('No leadership data');
        }
        if (record.founders.length > 0) {
            score += 10;
        } else {
            issues.push('No founder information');
        }

        if (record.products.length > 0) {
            score += 15;
        } else {
            issues.push('No product data');
        }

        // Signals
        if (record.metrics.length > 0) score += 8;
        if (record.mentions.length > 0) score += 7;

        return { score, maxScore: 100, issues };
    }
}
