import fs from 'fs';

/**
 * Reads a whole log file into lines. A final newline does not produce an
 * extra empty line; blank lines inside the file are kept.
 */
export async function readLogLines(filePath: string): Promise<string[]> {
  const content = await fs.promises.readFile(filePath, 'utf8');
  if (content.length === 0) return [];
  const lines = content.split('\n');
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}
