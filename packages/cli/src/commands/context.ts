/**
 * Shared command plumbing
 */

import { Site, SiteDirectory } from '../client/types';
import { FormatterOptions } from '../formatters';
import { InvocationArgs, Prompter, resolveInput } from '../input';

export interface Output {
  log(message: string): void;
  error(message: string): void;
}

export interface CommandContext {
  directory: SiteDirectory;
  prompter: Prompter;
  output: Output;
  options: FormatterOptions;
  /** Offer autocomplete candidates at prompts */
  autocomplete: boolean;
  /** Substrings of site URLs left out when targeting the whole fleet */
  excludedDomains: readonly string[];
  /** Run a remote call while showing progress */
  spin<T>(text: string, task: () => Promise<T>): Promise<T>;
}

/**
 * Resolve the `site` argument (domain or numeric ID) and look it up
 */
export async function resolveSite(ctx: CommandContext, args: InvocationArgs, message: string): Promise<Site> {
  const { value } = await resolveInput({
    name: 'site',
    args,
    required: true,
    prompt: () =>
      ctx.prompter.ask({
        message,
        autocomplete: ctx.autocomplete
          ? async () => {
              try {
                const sites = await ctx.spin('Loading sites...', () => ctx.directory.listSites());
                return sites.map((site) => site.domain);
              } catch {
                // The site can still be typed without suggestions
                return [];
              }
            }
          : undefined,
      }),
  });

  return ctx.spin(`Fetching site "${value}"...`, () => ctx.directory.getSite(value));
}
