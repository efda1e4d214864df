/**
 * Reads direct tweet links from a text file (one per line) or from the first
 * column of the first worksheet of an XLSX file.
 */

import * as ExcelJS from 'exceljs';
import { promises as fs } from 'fs';
import * as path from 'path';
import { IngestionErrors } from '../core/errors';

export async function loadLinksFile(filePath: string): Promise<string[]> {
  const ext = path.extname(filePath).toLowerCase();

  if (ext === '.txt') {
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      throw IngestionErrors.malformedInput(`Cannot read links file ${filePath}`, { link: filePath }).withContext({
        cause: error instanceof Error ? error.message : String(error),
      });
    }
    return content
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
  }

  if (ext === '.xlsx') {
    const workbook = new ExcelJS.Workbook();
    try {
      await workbook.xlsx.readFile(filePath);
    } catch (error) {
      throw IngestionErrors.malformedInput(`Cannot read links workbook ${filePath}`, { link: filePath }).withContext({
        cause: error instanceof Error ? error.message : String(error),
      });
    }
    const worksheet = workbook.worksheets[0];
    if (!worksheet) return [];

    const links: string[] = [];
    worksheet.eachRow((row) => {
      const text = row.getCell(1).text.trim();
      if (text) links.push(text);
    });
    return links;
  }

  throw IngestionErrors.malformedInput(`Unsupported links file type "${ext || filePath}", expected .txt or .xlsx`);
}
