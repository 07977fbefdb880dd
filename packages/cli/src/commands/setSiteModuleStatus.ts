/**
 * jetpack:set-site-module-status
 *
 * Turns a Jetpack module on or off on a single site.
 */

import { Site } from '../client/types';
import { InvalidInputError, RemoteFailureError } from '../errors';
import { formatProgress, formatSuccess } from '../formatters';
import { InvocationArgs, assertAllowed, confirmOrAbort, readExplicitValue, resolveEnumInput } from '../input';
import { CommandContext, resolveSite } from './context';

export const MODULE_STATUSES = ['on', 'off'] as const;

export type ModuleStatus = (typeof MODULE_STATUSES)[number];

export interface SetSiteModuleStatusResult {
  site: Site;
  module: string;
  status: ModuleStatus;
}

function isModuleStatus(value: string): value is ModuleStatus {
  return value === 'on' || value === 'off';
}

export async function setSiteModuleStatus(
  ctx: CommandContext,
  args: InvocationArgs
): Promise<SetSiteModuleStatusResult> {
  const { output, options, prompter } = ctx;

  const explicitStatus = readExplicitValue(args, 'status');
  if (explicitStatus !== null) {
    assertAllowed('status', explicitStatus, MODULE_STATUSES);
  }

  const site = await resolveSite(ctx, args, 'Enter the domain or WPCOM site ID to set the module status on');

  const modules = await ctx.spin(`Fetching modules of ${site.domain}...`, () =>
    ctx.directory.getSiteModules(site.id)
  );
  const slugs = modules.map((m) => m.slug);

  const { value: module } = await resolveEnumInput({
    name: 'module',
    args,
    allowed: slugs,
    required: true,
    prompt: () =>
      prompter.ask({
        message: 'Enter the module to set the status for',
        autocomplete: ctx.autocomplete ? slugs : undefined,
      }),
  });

  const { value: status } = await resolveEnumInput({
    name: 'status',
    args,
    allowed: MODULE_STATUSES,
    required: true,
    defaultValue: 'on',
    prompt: () =>
      prompter.ask({
        message: 'Enter the status to set the module to',
        autocomplete: ctx.autocomplete ? MODULE_STATUSES : undefined,
        default: 'on',
      }),
  });
  if (!isModuleStatus(status)) {
    throw InvalidInputError.notAllowed('status', status, MODULE_STATUSES);
  }

  const target = `${site.name} (ID ${site.id}, URL ${site.url})`;

  if (args.yes !== true) {
    await confirmOrAbort(
      prompter,
      `Are you sure you want to set the status of the Jetpack module ${module} to ${status} on ${target}?`
    );
  }

  output.log(formatProgress(`Setting the status of the Jetpack module ${module} to ${status} on ${target}.`, options));

  const updated = await ctx.spin('Updating module settings...', () =>
    ctx.directory.updateSiteModules(site.id, { [module]: status === 'on' })
  );
  if (updated !== true) {
    throw new RemoteFailureError('Failed to update the module status.');
  }

  output.log(formatSuccess('Module status updated successfully.', options));

  return { site, module, status };
}
