/**
 * Command Definitions
 *
 * Builds the commander program. Collaborators are injectable so the
 * whole command line can be driven from tests.
 */

import { Command } from 'commander';
import ora from 'ora';
import * as fs from 'fs';
import * as path from 'path';
import { SiteDirectory, WpcomClient } from './client';
import {
  CommandContext,
  Output,
  exportSitePlugins,
  listSiteModules,
  listSites,
  setSiteModuleStatus,
} from './commands';
import { FleetConfig, getConfigPath, loadConfig } from './config';
import { CommandError, ExitCode, UserAbortedError, getErrorMessage } from './errors';
import { FormatterOptions, formatError, formatWarning } from './formatters';
import { InvocationArgs, Prompter, ReadlinePrompter } from './input';

export interface ProgramDeps {
  loadConfig?: () => FleetConfig;
  createDirectory?: (config: FleetConfig) => SiteDirectory;
  createPrompter?: (options: FormatterOptions) => Prompter;
  output?: Output;
  exit?: (code: number) => void;
}

const consoleOutput: Output = {
  log: (message) => console.log(message),
  error: (message) => console.error(message),
};

function readVersion(): string {
  try {
    const raw: unknown = JSON.parse(fs.readFileSync(path.join(__dirname, '..', 'package.json'), 'utf-8'));
    if (typeof raw === 'object' && raw !== null && 'version' in raw && typeof raw.version === 'string') {
      return raw.version;
    }
  } catch {
    // Fall through to the placeholder version
  }
  return '0.0.0';
}

/**
 * Create the API client, failing when no token is configured
 */
export function createWpcomClient(config: FleetConfig): WpcomClient {
  if (!config.apiToken) {
    throw new CommandError(
      `No API token configured. Set WPFLEET_API_TOKEN or add "apiToken" to ${getConfigPath()}`
    );
  }

  return new WpcomClient({
    apiUrl: config.apiUrl,
    apiToken: config.apiToken,
    timeout: config.timeout,
  });
}

/**
 * Print a command failure and return the exit code to use
 */
export function reportCommandError(error: unknown, output: Output, options: FormatterOptions = {}): number {
  if (error instanceof UserAbortedError) {
    output.log(formatWarning(error.message, options));
    return error.exitCode;
  }

  if (error instanceof CommandError) {
    output.error(formatError(error.message, options));
    return error.exitCode;
  }

  output.error(formatError(getErrorMessage(error), options));
  return ExitCode.Failure;
}

function createSpin(options: FormatterOptions): CommandContext['spin'] {
  return async <T>(text: string, task: () => Promise<T>): Promise<T> => {
    if (options.quiet || options.json) {
      return task();
    }

    const spinner = ora(text).start();
    try {
      const result = await task();
      spinner.stop();
      return result;
    } catch (error) {
      spinner.fail();
      throw error;
    }
  };
}

export function createProgram(deps: ProgramDeps = {}): Command {
  const program = new Command();
  const output = deps.output ?? consoleOutput;
  const exit = deps.exit ?? ((code: number) => process.exit(code));

  /**
   * Run a command with common boilerplate
   *
   * Handles: config, client creation, prompts, error reporting, exit code
   */
  async function runCommand(handler: (ctx: CommandContext) => Promise<unknown>): Promise<void> {
    const globalOpts = program.opts();
    const options: FormatterOptions = {
      json: globalOpts.json === true,
      quiet: globalOpts.quiet === true,
      noColor: globalOpts.color === false,
    };

    try {
      const config = (deps.loadConfig ?? loadConfig)();
      const directory = (deps.createDirectory ?? createWpcomClient)(config);
      const prompter = deps.createPrompter
        ? deps.createPrompter(options)
        : new ReadlinePrompter({ noColor: options.noColor });

      await handler({
        directory,
        prompter,
        output,
        options,
        autocomplete: globalOpts.autocomplete !== false,
        excludedDomains: config.excludedDomains,
        spin: createSpin(options),
      });
    } catch (error: unknown) {
      exit(reportCommandError(error, output, options));
    }
  }

  program
    .name('wpfleet')
    .description('Manage a fleet of Jetpack-connected WordPress.com sites')
    .version(readVersion());

  // Global options
  program
    .option('--json', 'Output results as JSON')
    .option('--quiet', 'Minimal output (IDs/slugs only)')
    .option('--no-color', 'Disable colored output')
    .option('--no-autocomplete', 'Do not offer autocomplete suggestions at prompts');

  program
    .command('jetpack:list-sites')
    .description('List the Jetpack-connected sites you can manage')
    .option('--exclude-staging', 'Leave out staging and non-production sites')
    .action(async (cmdOptions: { excludeStaging?: boolean }) => {
      await runCommand((ctx) => listSites(ctx, { excludeStaging: cmdOptions.excludeStaging === true }));
    });

  program
    .command('jetpack:list-site-modules')
    .description('List the Jetpack modules of a site and their status')
    .argument('[site]', 'Domain or WPCOM ID of the site')
    .option('--status <status>', 'Filter by status (on|off|all)', 'all')
    .action(async (site: string | undefined, cmdOptions: { status?: string }) => {
      const args: InvocationArgs = { site, status: cmdOptions.status };
      await runCommand((ctx) => listSiteModules(ctx, args));
    });

  program
    .command('jetpack:set-site-module-status')
    .alias('jetpack:toggle-site-module')
    .description('Set the status of a Jetpack module on a given site')
    .argument('[site]', 'Domain or WPCOM ID of the site to set the module status on')
    .argument('[module]', 'The module to set the status for')
    .argument('[status]', "The status to set the module to (on|off). By default, 'on'")
    .option('-y, --yes', 'Skip confirmation')
    .action(
      async (
        site: string | undefined,
        module: string | undefined,
        status: string | undefined,
        cmdOptions: { yes?: boolean }
      ) => {
        const args: InvocationArgs = { site, module, status, yes: cmdOptions.yes === true };
        await runCommand((ctx) => setSiteModuleStatus(ctx, args));
      }
    );

  program
    .command('jetpack:export-site-plugins')
    .description('Export the plugins installed on Jetpack-connected sites to a CSV file')
    .argument('[site]', 'Domain or WPCOM ID of the site to list the plugins for')
    .option('--multiple <multiple>', 'Target every site instead of one. Accepted value is `all`')
    .option('-d, --destination <file>', 'The destination file to export the plugins to')
    .action(async (site: string | undefined, cmdOptions: { multiple?: string; destination?: string }) => {
      const args: InvocationArgs = { site, multiple: cmdOptions.multiple, destination: cmdOptions.destination };
      await runCommand((ctx) => exportSitePlugins(ctx, args));
    });

  return program;
}
