export { AuditLogger, AUDIT_COLUMNS } from './AuditLogger';
export type { AuditWriteResult } from './AuditLogger';
export { toCsvRow, escapeCsvField } from './csv';
