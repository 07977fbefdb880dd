/**
 * Plugin Export Rows
 *
 * Flattens per-site plugin payloads into one record per (site, plugin).
 */

import * as path from 'path';
import { BatchResult, PluginEntry, Site } from '../client/types';
import { FailedSite } from '../formatters';

export interface PluginRecord {
  siteId: number;
  siteUrl: string;
  name: string;
  slug: string;
  version: string;
  active: boolean;
}

export const PLUGIN_CSV_HEADER = [
  'Site ID',
  'Site URL',
  'Plugin Name',
  'Plugin Slug',
  'Plugin Version',
  'Plugin Status',
];

/**
 * Slug from a plugin file: its directory, or the file name for
 * single-file plugins (`hello.php` -> `hello`).
 *
 * The plain dirname would be `.` for single-file plugins.
 */
export function getPluginSlug(file: string): string {
  const dir = path.posix.dirname(file);
  if (dir !== '.') {
    return dir;
  }
  return path.posix.basename(file, '.php');
}

export interface PartitionedResults {
  succeeded: Map<number, PluginEntry[]>;
  failed: FailedSite[];
}

/**
 * Split batch results into succeeded payloads and failed sites, keeping
 * the order of the targeted sites. Sites without a result are in neither.
 */
export function partitionBatchResults(
  sites: Site[],
  results: Map<number, BatchResult<PluginEntry[]>>
): PartitionedResults {
  const succeeded = new Map<number, PluginEntry[]>();
  const failed: FailedSite[] = [];

  for (const site of sites) {
    const result = results.get(site.id);
    if (!result) continue;

    if (result.ok) {
      succeeded.set(site.id, result.value);
    } else {
      failed.push({ siteId: site.id, siteUrl: site.url, error: result.error });
    }
  }

  return { succeeded, failed };
}

export function flattenPluginRecords(sites: Site[], succeeded: Map<number, PluginEntry[]>): PluginRecord[] {
  const records: PluginRecord[] = [];

  for (const site of sites) {
    for (const plugin of succeeded.get(site.id) ?? []) {
      records.push({
        siteId: site.id,
        siteUrl: site.url,
        name: plugin.name,
        slug: getPluginSlug(plugin.file),
        version: plugin.version,
        active: plugin.active,
      });
    }
  }

  return records;
}

export function toCsvRow(record: PluginRecord): Array<string | number> {
  return [
    record.siteId,
    record.siteUrl,
    record.name,
    record.slug,
    record.version,
    record.active ? 'Active' : 'Inactive',
  ];
}
