import * as ExcelJS from 'exceljs';
import { Logger } from '../logger';
import { OrganizationBackup } from '../backup/models';
import { writeFileAtomic } from './output';
import {
  TeamGroup,
  buildTeamGroups,
  buildTeamOverview,
  buildUserSummaries,
  buildUsersWithoutTeams,
  compareIgnoringCase,
  splitRepository,
} from './views';

const logger = new Logger('ExcelExporter');

export const SHEET_NAMES = {
  teamsOverview: 'Teams Overview',
  teamMemberships: 'Team Memberships',
  teamRepositories: 'Team Repositories',
  usersSummary: 'Users Summary',
  usersWithoutTeams: 'Users Without Teams',
} as const;

type CellValue = string | number;

const solid = (argb: string): ExcelJS.FillPattern => ({ type: 'pattern', pattern: 'solid', fgColor: { argb } });

const thin: ExcelJS.Border = { style: 'thin', color: { argb: 'FF000000' } };

const STYLE = {
  headerFont: { bold: true, color: { argb: 'FFFFFFFF' } } satisfies Partial<ExcelJS.Font>,
  bandFont: { bold: true, size: 14, color: { argb: 'FFFFFFFF' } } satisfies Partial<ExcelJS.Font>,
  headerFill: solid('FF366092'),
  teamBandFill: solid('FF4472C4'),
  repoHeaderFill: solid('FF70AD47'),
  subHeaderFill: solid('FFD9D9D9'),
  altRowFill: solid('FFF2F2F2'),
  border: { top: thin, left: thin, bottom: thin, right: thin } satisfies Partial<ExcelJS.Borders>,
  center: { horizontal: 'center', vertical: 'middle' } satisfies Partial<ExcelJS.Alignment>,
  left: { horizontal: 'left', vertical: 'middle' } satisfies Partial<ExcelJS.Alignment>,
};

/**
 * Workbook with one sheet per view: overview, memberships and repositories
 * grouped by team, all users, and users in no team.
 */
export function buildWorkbook(backup: OrganizationBackup): ExcelJS.Workbook {
  const workbook = new ExcelJS.Workbook();
  const groups = buildTeamGroups(backup);

  addTeamsOverviewSheet(workbook, backup);
  addTeamMembershipsSheet(workbook, groups);
  addTeamRepositoriesSheet(workbook, groups);
  addUsersSummarySheet(workbook, backup);
  addUsersWithoutTeamsSheet(workbook, backup);

  return workbook;
}

export async function exportToExcel(backup: OrganizationBackup, filePath: string): Promise<string> {
  const buffer = await buildWorkbook(backup).xlsx.writeBuffer();
  await writeFileAtomic(filePath, Buffer.from(buffer));
  logger.info(`Excel file exported: ${filePath}`);
  return filePath;
}

function writeHeaderRow(sheet: ExcelJS.Worksheet, headers: readonly string[]): void {
  headers.forEach((header, index) => {
    const cell = sheet.getCell(1, index + 1);
    cell.value = header;
    cell.font = STYLE.headerFont;
    cell.fill = STYLE.headerFill;
    cell.alignment = STYLE.center;
    cell.border = STYLE.border;
  });
}

/**
 * Data rows from row 2; even rows shaded, columns in `leftAligned` (1-based)
 * left-aligned and the rest centred.
 */
function writeTableRows(sheet: ExcelJS.Worksheet, rows: readonly CellValue[][], leftAligned: readonly number[]): void {
  rows.forEach((values, index) => {
    const row = index + 2;
    values.forEach((value, colIndex) => {
      const col = colIndex + 1;
      const cell = sheet.getCell(row, col);
      cell.value = value;
      cell.border = STYLE.border;
      cell.alignment = leftAligned.includes(col) ? STYLE.left : STYLE.center;
      if (row % 2 === 0) {
        cell.fill = STYLE.altRowFill;
      }
    });
  });
}

function setWidths(sheet: ExcelJS.Worksheet, widths: readonly number[]): void {
  widths.forEach((width, index) => {
    sheet.getColumn(index + 1).width = width;
  });
}

/**
 * Merged, filled title band across `columns` columns of `row`
 */
function writeTeamBand(sheet: ExcelJS.Worksheet, row: number, columns: number, title: string): void {
  sheet.mergeCells(row, 1, row, columns);
  for (let col = 1; col <= columns; col++) {
    const cell = sheet.getCell(row, col);
    cell.border = STYLE.border;
    cell.fill = STYLE.teamBandFill;
  }
  const titleCell = sheet.getCell(row, 1);
  titleCell.value = title;
  titleCell.font = STYLE.bandFont;
  titleCell.alignment = STYLE.center;
}

function writeCaption(sheet: ExcelJS.Worksheet, row: number, text: string): void {
  const cell = sheet.getCell(row, 1);
  cell.value = text;
  cell.font = { italic: true };
  cell.alignment = STYLE.left;
}

function addTeamsOverviewSheet(workbook: ExcelJS.Workbook, backup: OrganizationBackup): void {
  const sheet = workbook.addWorksheet(SHEET_NAMES.teamsOverview);
  writeHeaderRow(sheet, [
    'Team Name',
    'Team Slug',
    'Privacy',
    'Description',
    'Member Count',
    'Repository Count',
    'Repository List',
  ]);
  writeTableRows(
    sheet,
    buildTeamOverview(backup).map((team) => [
      team.name,
      team.slug,
      team.privacy,
      team.description,
      team.memberCount,
      team.repositories.length,
      team.repositories.join('; '),
    ]),
    [1, 3, 7]
  );
  setWidths(sheet, [25, 15, 15, 30, 15, 15, 50]);
}

function addTeamMembershipsSheet(workbook: ExcelJS.Workbook, groups: readonly TeamGroup[]): void {
  const sheet = workbook.addWorksheet(SHEET_NAMES.teamMemberships);
  let row = 1;

  for (const { team, members } of groups) {
    writeTeamBand(sheet, row, 5, team.name);
    row++;

    writeCaption(sheet, row, `${members.length} members`);
    row++;

    ['Username', 'User Email', 'Team Role', 'Org Role'].forEach((header, index) => {
      const cell = sheet.getCell(row, index + 1);
      cell.value = header;
      cell.font = { bold: true };
      cell.fill = STYLE.subHeaderFill;
      cell.alignment = STYLE.center;
      cell.border = STYLE.border;
    });
    row++;

    const sorted = [...members].sort((a, b) => compareIgnoringCase(a.user.username, b.user.username));
    for (const { user, role } of sorted) {
      [user.username, user.email || '', role, user.role].forEach((value, index) => {
        const cell = sheet.getCell(row, index + 1);
        cell.value = value;
        cell.border = STYLE.border;
        cell.alignment = index < 2 ? STYLE.left : STYLE.center;
      });
      row++;
    }

    // blank spacer row between teams
    row++;
  }

  setWidths(sheet, [20, 25, 15, 15]);
}

function addTeamRepositoriesSheet(workbook: ExcelJS.Workbook, groups: readonly TeamGroup[]): void {
  const sheet = workbook.addWorksheet(SHEET_NAMES.teamRepositories);
  let row = 1;

  for (const { team } of groups) {
    const repositories = [...new Set(team.repositories)].sort();
    if (repositories.length === 0) {
      continue;
    }

    writeTeamBand(sheet, row, 4, team.name);
    row++;

    writeCaption(sheet, row, `${repositories.length} repositories`);
    row++;

    ['Repository Name', 'Full Repository Path', 'Organization', 'Project'].forEach((header, index) => {
      const cell = sheet.getCell(row, index + 1);
      cell.value = header;
      cell.font = STYLE.headerFont;
      cell.fill = STYLE.repoHeaderFill;
      cell.alignment = STYLE.center;
      cell.border = STYLE.border;
    });
    row++;

    for (const repository of repositories) {
      const { owner, repositoryName } = splitRepository(repository);
      [repositoryName, repository, owner, repositoryName].forEach((value, index) => {
        const cell = sheet.getCell(row, index + 1);
        cell.value = value;
        cell.border = STYLE.border;
        cell.alignment = STYLE.left;
        if (row % 2 === 0) {
          cell.fill = STYLE.altRowFill;
        }
      });
      row++;
    }

    row++;
  }

  setWidths(sheet, [30, 50, 20, 30]);
}

function addUsersSummarySheet(workbook: ExcelJS.Workbook, backup: OrganizationBackup): void {
  const sheet = workbook.addWorksheet(SHEET_NAMES.usersSummary);
  writeHeaderRow(sheet, ['Username', 'User ID', 'Email', 'Org Role', 'Team Count', 'Team List']);
  writeTableRows(
    sheet,
    buildUserSummaries(backup).map((user) => [
      user.username,
      user.userId,
      user.email || '',
      user.orgRole,
      user.teamNames.length,
      user.teamNames.join('; '),
    ]),
    [1, 3, 6]
  );
  setWidths(sheet, [20, 12, 25, 12, 12, 50]);
}

function addUsersWithoutTeamsSheet(workbook: ExcelJS.Workbook, backup: OrganizationBackup): void {
  const sheet = workbook.addWorksheet(SHEET_NAMES.usersWithoutTeams);
  writeHeaderRow(sheet, ['Username', 'User ID', 'Email', 'Org Role']);
  writeTableRows(
    sheet,
    buildUsersWithoutTeams(backup).map((user) => [user.username, user.userId, user.email || '', user.orgRole]),
    [1, 3]
  );
  setWidths(sheet, [20, 12, 25, 12]);
}
