/**
 * jetpack:list-sites
 */

import { Site } from '../client/types';
import { formatSiteList, getOutputFormat } from '../formatters';
import { InvocationArgs } from '../input';
import { filterExcludedSites } from '../utils/siteFilter';
import { CommandContext } from './context';

export async function listSites(ctx: CommandContext, args: InvocationArgs): Promise<Site[]> {
  const fleet = await ctx.spin('Fetching Jetpack sites...', () => ctx.directory.listSites());
  const sites = args.excludeStaging === true ? filterExcludedSites(fleet, ctx.excludedDomains) : fleet;

  ctx.output.log(formatSiteList(sites, getOutputFormat(ctx.options), { noColor: ctx.options.noColor }));
  return sites;
}
