/**
 * File utilities for the export directory
 * 统一管理输出文件命名与目录创建
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { EXPORT_EXTENSIONS } from '../config/constants';
import { DateUtils } from './date-utils';
import { createModuleLogger } from './logger';

const logger = createModuleLogger('FileUtils');

const DEFAULT_IDENTIFIER = 'tweets';

export type ExportFormat = keyof typeof EXPORT_EXTENSIONS;

/**
 * 简单清理文件路径片段，避免非法字符
 */
export function sanitizeSegment(segment: string = ''): string {
  return (
    String(segment)
      .trim()
      .toLowerCase()
      .replace(/[^a-z0-9-_]+/gi, '-')
      .replace(/-{2,}/g, '-')
      .replace(/^-|-$/g, '') || DEFAULT_IDENTIFIER
  );
}

/**
 * 确保目录存在
 */
export async function ensureDirExists(dir: string): Promise<boolean> {
  if (!dir) {
    logger.warn('ensureDirExists requires directory path');
    return false;
  }
  try {
    await fs.mkdir(dir, { recursive: true });
    return true;
  } catch (error) {
    logger.error(`Failed to create directory: ${dir}`, error instanceof Error ? error : undefined);
    return false;
  }
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile();
  } catch {
    return false;
  }
}

/**
 * `<outputDir>/<identifier>_<YYYYMMDD_HHmmss>.<ext>`, absolute.
 */
export function buildOutputPath(
  outputDir: string,
  identifier: string,
  format: ExportFormat,
  now: Date = new Date()
): string {
  const fileName = `${sanitizeSegment(identifier)}_${DateUtils.toFileStamp(now)}.${EXPORT_EXTENSIONS[format]}`;
  return path.resolve(outputDir, fileName);
}
