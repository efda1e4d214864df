/**
 * XLSX export sink (exceljs)
 *
 * The workbook is kept in memory and rewritten on every flush; the data row
 * count is the resume marker.
 */

import * as ExcelJS from 'exceljs';
import * as path from 'path';
import { EXPORT_COLUMNS, EXPORT_PATH_COLUMN, SHEET_TITLE_MAX_LENGTH } from '../config/constants';
import { IngestionErrors } from '../core/errors';
import { toExportRow } from '../types/tweet-definitions';
import type { Tweet } from '../types/tweet-definitions';
import { DateUtils } from './date-utils';
import type { ExportSink, ExportSinkOptions, FlushMarker } from './export';
import { ensureDirExists, fileExists } from './fileutils';

/**
 * Worksheet titles: at most 31 characters, none of `\ / * ? : [ ]`.
 * Falls back to `Sheet_<YYYYMMDD_HHmmss>` when nothing usable is left.
 */
export function sanitizeSheetTitle(name: string, now: Date = new Date()): string {
  const fallback = `Sheet_${DateUtils.toFileStamp(now)}`;
  if (!name) {
    return fallback;
  }

  let title = name
    .normalize('NFKD')
    .replace(/\p{Extended_Pictographic}/gu, '')
    .replace(/[\\/*?:[\]|()<>"'{}]/g, '_')
    .replace(/[^A-Za-z0-9\s_-]/g, '')
    .replace(/[\s_-]+/g, '_')
    .replace(/^_+|_+$/g, '');

  if (title.length > SHEET_TITLE_MAX_LENGTH) {
    title = title.slice(0, SHEET_TITLE_MAX_LENGTH).replace(/_+$/, '');
  }

  return title || fallback;
}

export class XlsxExportSink implements ExportSink {
  public readonly format = 'xlsx' as const;
  private workbook: ExcelJS.Workbook | null = null;
  private worksheet: ExcelJS.Worksheet | null = null;
  private pending = 0;
  private flushedRows = 0;

  constructor(private readonly options: ExportSinkOptions) {}

  get outputPath(): string {
    return this.options.outputPath;
  }

  get rowCount(): number {
    return this.flushedRows + this.pending;
  }

  get pendingRows(): number {
    return this.pending;
  }

  async open(): Promise<void> {
    const filePath = this.outputPath;
    if (!(await ensureDirExists(path.dirname(filePath)))) {
      throw IngestionErrors.fileSystem(`Cannot create output directory for ${filePath}`, { outputPath: filePath });
    }

    const workbook = new ExcelJS.Workbook();
    const resume = this.options.resumeFrom;

    if (resume) {
      if (!(await fileExists(filePath))) {
        throw IngestionErrors.fileSystem(`Output file to resume is missing: ${filePath}`, { outputPath: filePath });
      }
      await workbook.xlsx.readFile(filePath);
      const worksheet = workbook.worksheets[0];
      if (!worksheet) {
        throw IngestionErrors.fileSystem(`Workbook has no worksheet: ${filePath}`, { outputPath: filePath });
      }
      const keep = resume.rows + 1;
      if (worksheet.rowCount > keep) {
        worksheet.spliceRows(keep + 1, worksheet.rowCount - keep);
        await workbook.xlsx.writeFile(filePath);
      }
      this.worksheet = worksheet;
      this.flushedRows = resume.rows;
    } else {
      const now = this.options.now ? this.options.now() : new Date();
      const title = this.options.sheetTitle ?? path.basename(filePath, path.extname(filePath));
      const worksheet = workbook.addWorksheet(sanitizeSheetTitle(title, now));
      worksheet.addRow([...EXPORT_COLUMNS, EXPORT_PATH_COLUMN]);
      await workbook.xlsx.writeFile(filePath);
      this.worksheet = worksheet;
      this.flushedRows = 0;
    }

    this.workbook = workbook;
  }

  append(tweet: Tweet): void {
    if (!this.worksheet) {
      throw IngestionErrors.fileSystem('XLSX sink used before open()', { outputPath: this.outputPath });
    }
    this.worksheet.addRow([...toExportRow(tweet), path.resolve(this.outputPath)]);
    this.pending += 1;
  }

  async flush(): Promise<FlushMarker> {
    if (this.workbook && this.pending > 0) {
      await this.workbook.xlsx.writeFile(this.outputPath);
      this.flushedRows += this.pending;
      this.pending = 0;
    }
    return { rows: this.flushedRows };
  }

  async close(): Promise<FlushMarker> {
    return this.flush();
  }
}
