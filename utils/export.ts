/**
 * Export sinks
 * 追加写入的导出器：CSV（手写转义）与 XLSX（exceljs，见 spreadsheet-export.ts）
 *
 * Rows are buffered in memory and persisted on `flush()`. The flush marker
 * (data rows, and byte length for CSV) is what checkpoints record, so a
 * resumed sink can cut the file back to the last checkpointed state.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { EXPORT_COLUMNS } from '../config/constants';
import { IngestionErrors } from '../core/errors';
import { toExportRow } from '../types/tweet-definitions';
import type { ExportCell, Tweet } from '../types/tweet-definitions';
import { ensureDirExists, fileExists } from './fileutils';
import type { ExportFormat } from './fileutils';
import { XlsxExportSink } from './spreadsheet-export';

export interface FlushMarker {
  /** Data rows persisted (header excluded) */
  rows: number;
  /** File length in bytes; CSV only */
  bytes?: number;
}

export type ResumePoint = FlushMarker;

export interface ExportSinkOptions {
  outputPath: string;
  /** Reopen an existing file instead of creating it */
  resumeFrom?: ResumePoint;
  /** Worksheet title (XLSX) */
  sheetTitle?: string;
  now?: () => Date;
}

export interface ExportSink {
  readonly format: ExportFormat;
  readonly outputPath: string;
  /** Rows appended so far, flushed or pending */
  readonly rowCount: number;
  readonly pendingRows: number;
  open(): Promise<void>;
  append(tweet: Tweet): void;
  flush(): Promise<FlushMarker>;
  close(): Promise<FlushMarker>;
}

/**
 * CSV escaping: quotes doubled, field quoted when it holds a delimiter,
 * a quote or a line break.
 */
export function escapeCsvValue(value: ExportCell): string {
  if (typeof value === 'number') {
    return String(value);
  }
  const escaped = value.replace(/"/g, '""');
  return /[,"\n\r]/.test(escaped) ? `"${escaped}"` : escaped;
}

export function formatCsvLine(values: readonly ExportCell[]): string {
  return `${values.map(escapeCsvValue).join(',')}\n`;
}

export class CsvExportSink implements ExportSink {
  public readonly format = 'csv' as const;
  private pending: string[] = [];
  private flushedRows = 0;
  private bytes = 0;
  private opened = false;

  constructor(private readonly options: ExportSinkOptions) {}

  get outputPath(): string {
    return this.options.outputPath;
  }

  get rowCount(): number {
    return this.flushedRows + this.pending.length;
  }

  get pendingRows(): number {
    return this.pending.length;
  }

  async open(): Promise<void> {
    const filePath = this.outputPath;
    if (!(await ensureDirExists(path.dirname(filePath)))) {
      throw IngestionErrors.fileSystem(`Cannot create output directory for ${filePath}`, { outputPath: filePath });
    }

    const resume = this.options.resumeFrom;
    if (resume) {
      if (!(await fileExists(filePath))) {
        throw IngestionErrors.fileSystem(`Output file to resume is missing: ${filePath}`, { outputPath: filePath });
      }
      const { size } = await fs.stat(filePath);
      if (resume.bytes !== undefined && size < resume.bytes) {
        throw IngestionErrors.fileSystem(
          `Output file is shorter than its checkpoint (${size} < ${resume.bytes} bytes): ${filePath}`,
          { outputPath: filePath }
        );
      }
      if (resume.bytes !== undefined && size > resume.bytes) {
        // Drop rows flushed after the last checkpoint
        await fs.truncate(filePath, resume.bytes);
        this.bytes = resume.bytes;
      } else {
        this.bytes = size;
      }
      this.flushedRows = resume.rows;
    } else {
      const header = formatCsvLine(EXPORT_COLUMNS);
      await fs.writeFile(filePath, header, 'utf-8');
      this.bytes = Buffer.byteLength(header, 'utf-8');
      this.flushedRows = 0;
    }
    this.opened = true;
  }

  append(tweet: Tweet): void {
    if (!this.opened) {
      throw IngestionErrors.fileSystem('CSV sink used before open()', { outputPath: this.outputPath });
    }
    this.pending.push(formatCsvLine(toExportRow(tweet)));
  }

  async flush(): Promise<FlushMarker> {
    if (this.pending.length > 0) {
      const chunk = this.pending.join('');
      await fs.appendFile(this.outputPath, chunk, 'utf-8');
      this.bytes += Buffer.byteLength(chunk, 'utf-8');
      this.flushedRows += this.pending.length;
      this.pending = [];
    }
    return { rows: this.flushedRows, bytes: this.bytes };
  }

  async close(): Promise<FlushMarker> {
    return this.flush();
  }
}

export function createExportSink(format: ExportFormat, options: ExportSinkOptions): ExportSink {
  switch (format) {
    case 'csv':
      return new CsvExportSink(options);
    case 'xlsx':
      return new XlsxExportSink(options);
  }
}
