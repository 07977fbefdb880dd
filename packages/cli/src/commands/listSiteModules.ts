/**
 * jetpack:list-site-modules
 *
 * Lists the Jetpack modules of a site with their on/off state.
 */

import { SiteModule } from '../client/types';
import { formatModuleList, getOutputFormat } from '../formatters';
import { InvocationArgs, resolveEnumInput } from '../input';
import { CommandContext, resolveSite } from './context';

export const MODULE_FILTERS = ['on', 'off', 'all'] as const;

export async function listSiteModules(ctx: CommandContext, args: InvocationArgs): Promise<SiteModule[]> {
  const { value: filter } = await resolveEnumInput({
    name: 'status',
    args,
    allowed: MODULE_FILTERS,
    required: true,
    defaultValue: 'all',
  });

  const site = await resolveSite(ctx, args, 'Enter the domain or WPCOM site ID to list the modules of');
  const modules = await ctx.spin(`Fetching modules of ${site.domain}...`, () =>
    ctx.directory.getSiteModules(site.id)
  );

  const shown = filter === 'all' ? modules : modules.filter((m) => m.activated === (filter === 'on'));

  ctx.output.log(formatModuleList(shown, getOutputFormat(ctx.options), { noColor: ctx.options.noColor }));
  return shown;
}
