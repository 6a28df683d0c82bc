export * from './views';
export * from './output';
export { exportToJson, exportToStructuredJson, toStructuredBackup } from './json-exporter';
export type { StructuredBackup, StructuredTeam, StructuredTeamMember, StructuredUserWithoutTeams } from './json-exporter';
export { exportToCsv, exportToMultipleCsvs, formatCsv, formatCsvField } from './csv-exporter';
export type { CsvValue } from './csv-exporter';
export { exportToExcel, buildWorkbook, SHEET_NAMES } from './excel-exporter';
