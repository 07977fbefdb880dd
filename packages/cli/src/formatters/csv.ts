/**
 * CSV Output
 */

import { open, FileHandle } from 'fs/promises';
import { OutputIOError, getErrorMessage } from '../errors';

const NEEDS_QUOTES = /[",\s]/;

export function formatCsvField(value: string | number): string {
  const text = String(value);
  if (!NEEDS_QUOTES.test(text)) {
    return text;
  }
  return `"${text.replace(/"/g, '""')}"`;
}

export function formatCsvLine(fields: Array<string | number>): string {
  return `${fields.map(formatCsvField).join(',')}\n`;
}

/**
 * Write a header and rows to a CSV file, one line at a time
 */
export async function writeCsv(
  destination: string,
  header: string[],
  rows: Iterable<Array<string | number>>
): Promise<void> {
  let handle: FileHandle;
  try {
    handle = await open(destination, 'w');
  } catch (error: unknown) {
    throw new OutputIOError(`Failed to open the destination file: ${getErrorMessage(error)}`, destination);
  }

  let failure: OutputIOError | null = null;
  try {
    await handle.write(formatCsvLine(header));
    for (const row of rows) {
      await handle.write(formatCsvLine(row));
    }
  } catch (error: unknown) {
    failure = new OutputIOError(`Failed to write the destination file: ${getErrorMessage(error)}`, destination);
  }

  try {
    await handle.close();
  } catch (error: unknown) {
    // Keep the write failure when there is one
    if (!failure) {
      failure = new OutputIOError(`Failed to close the destination file: ${getErrorMessage(error)}`, destination);
    }
  }

  if (failure) {
    throw failure;
  }
}
