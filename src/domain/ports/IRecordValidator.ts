import { StructuredRecord, ValidationReport } from '../entities/CompanyIntel';

/**
 * Pure scoring function. Implementations must not perform I/O.
 */
export interface IRecordValidator {
    validate(record: StructuredRecord): ValidationReport;
}
