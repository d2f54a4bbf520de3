import type { AuditOutput } from '@invoice-audit/model';

import { writeFile } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';

/**
 * `<stem>_audit_result.json` for a document path
 */
export function resultFileName(pdfPath: string): string {
  const name = basename(pdfPath);
  return `${basename(name, extname(name))}_audit_result.json`;
}

export function formatAuditOutput(output: AuditOutput): string {
  return JSON.stringify(output, null, 2);
}

/**
 * Write the audit output next to the working directory.
 *
 * @returns path of the written file
 */
export async function writeAuditResult(
  output: AuditOutput,
  pdfPath: string,
  outputDir: string,
): Promise<string> {
  const outputPath = join(outputDir, resultFileName(pdfPath));
  await writeFile(outputPath, formatAuditOutput(output) + '\n', 'utf8');
  return outputPath;
}
