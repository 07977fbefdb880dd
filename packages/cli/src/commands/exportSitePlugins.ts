/**
 * jetpack:export-site-plugins
 *
 * Exports the plugins installed on one site, or on every site of the
 * fleet, to a CSV file.
 */

import * as path from 'path';
import { Site } from '../client/types';
import { FailedSite, formatFailedSites, formatProgress, formatSuccess } from '../formatters';
import { writeCsv } from '../formatters/csv';
import { InvocationArgs, resolveEnumInput, resolveInput } from '../input';
import { PLUGIN_CSV_HEADER, PluginRecord, flattenPluginRecords, partitionBatchResults, toCsvRow } from '../utils/plugins';
import { filterExcludedSites } from '../utils/siteFilter';
import { CommandContext, resolveSite } from './context';

export const MULTIPLE_VALUES = ['all'] as const;

export const FAILED_SITES_TITLE = 'Sites that could NOT be searched';

export interface ExportSitePluginsResult {
  destination: string;
  sites: Site[];
  failed: FailedSite[];
  records: PluginRecord[];
}

/**
 * Append `.csv` unless the path already ends with it
 */
export function normalizeDestination(destination: string): string {
  return destination.endsWith('.csv') ? destination : `${destination}.csv`;
}

export function defaultDestination(cwd: string, now: Date): string {
  const stamp = now.toISOString().slice(0, 19).replace('T', '-').replace(/:/g, '-');
  return path.join(cwd, `plugins-on-jetpack-sites-${stamp}.csv`);
}

export async function exportSitePlugins(
  ctx: CommandContext,
  args: InvocationArgs,
  now: Date = new Date()
): Promise<ExportSitePluginsResult> {
  const { output, options } = ctx;

  const fallback = defaultDestination(process.cwd(), now);
  const resolvedDestination = await resolveInput({
    name: 'destination',
    args,
    required: true,
    defaultValue: fallback,
    prompt: () =>
      ctx.prompter.ask({
        message: 'Enter the path to the file you want to save the output to',
        default: fallback,
      }),
  });
  const destination = normalizeDestination(resolvedDestination.value);
  args.destination = destination;

  const multiple = await resolveEnumInput({ name: 'multiple', args, allowed: MULTIPLE_VALUES });

  let sites: Site[];
  if (multiple.value !== 'all') {
    sites = [await resolveSite(ctx, args, 'Enter the domain or WPCOM site ID to export the plugins for')];
  } else {
    const fleet = await ctx.spin('Fetching Jetpack sites...', () => ctx.directory.listSites());
    sites = filterExcludedSites(fleet, ctx.excludedDomains);
  }
  output.log(`Successfully fetched ${sites.length} Jetpack site(s).`);

  const results = await ctx.spin('Fetching plugins...', () =>
    ctx.directory.getSitePluginsBatch(sites.map((site) => site.id))
  );

  const { succeeded, failed } = partitionBatchResults(sites, results);
  if (failed.length > 0) {
    output.log(formatFailedSites(FAILED_SITES_TITLE, failed, options));
  }

  output.log(
    formatProgress(`Exporting plugins installed on ${succeeded.size} Jetpack site(s) to ${destination}.`, options)
  );

  const records = flattenPluginRecords(sites, succeeded);
  await writeCsv(destination, PLUGIN_CSV_HEADER, records.map(toCsvRow));

  output.log(formatSuccess('Plugins list exported successfully.', options));

  return { destination, sites, failed, records };
}
