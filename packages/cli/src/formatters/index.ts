/**
 * Output Formatters
 *
 * Format command output for different modes:
 * - table: Human-readable ASCII tables (default)
 * - json: JSON output for scripting
 * - quiet: Minimal output (IDs/slugs only)
 */

import Table from 'cli-table3';
import chalk from 'chalk';
import { RemoteErrorPayload, Site, SiteModule } from '../client/types';

export type OutputFormat = 'table' | 'json' | 'quiet';

export interface FormatterOptions {
  json?: boolean;
  quiet?: boolean;
  noColor?: boolean;
}

/**
 * Get the output format from CLI options
 */
export function getOutputFormat(options: FormatterOptions): OutputFormat {
  if (options.json) return 'json';
  if (options.quiet) return 'quiet';
  return 'table';
}

/**
 * Format data as a table
 */
export function formatTable(
  headers: string[],
  rows: string[][],
  options: { noColor?: boolean } = {}
): string {
  const table = new Table({
    head: options.noColor ? headers : headers.map((h) => chalk.bold(h)),
    style: {
      head: options.noColor ? [] : ['cyan'],
      border: options.noColor ? [] : ['grey'],
    },
  });

  rows.forEach((row) => table.push(row));

  return table.toString();
}

/**
 * Format data as JSON
 */
export function formatJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

/**
 * Format data as quiet output (one item per line)
 */
export function formatQuiet(items: string[]): string {
  return items.join('\n');
}

/**
 * Format a success message
 */
export function formatSuccess(message: string, options: { noColor?: boolean } = {}): string {
  if (options.noColor) {
    return `✓ ${message}`;
  }
  return chalk.green(`✓ ${message}`);
}

/**
 * Format an error message
 */
export function formatError(message: string, options: { noColor?: boolean } = {}): string {
  if (options.noColor) {
    return `✗ ${message}`;
  }
  return chalk.red(`✗ ${message}`);
}

/**
 * Format a warning message
 */
export function formatWarning(message: string, options: { noColor?: boolean } = {}): string {
  if (options.noColor) {
    return `⚠ ${message}`;
  }
  return chalk.yellow(`⚠ ${message}`);
}

/**
 * Format an announcement of the action about to run
 */
export function formatProgress(message: string, options: { noColor?: boolean } = {}): string {
  if (options.noColor) {
    return message;
  }
  return chalk.magenta.bold(message);
}

/**
 * Format a module status badge
 */
export function formatStatus(activated: boolean, options: { noColor?: boolean } = {}): string {
  const status = activated ? 'on' : 'off';
  if (options.noColor) {
    return status;
  }
  return activated ? chalk.green(status) : chalk.gray(status);
}

export function formatSiteList(
  sites: Site[],
  format: OutputFormat,
  options: { noColor?: boolean } = {}
): string {
  switch (format) {
    case 'json':
      return formatJson(sites);

    case 'quiet':
      return formatQuiet(sites.map((s) => s.domain));

    case 'table':
    default:
      if (sites.length === 0) {
        return 'No sites found.';
      }

      return formatTable(
        ['ID', 'Name', 'URL'],
        sites.map((s) => [String(s.id), s.name, s.url]),
        options
      );
  }
}

export function formatModuleList(
  modules: SiteModule[],
  format: OutputFormat,
  options: { noColor?: boolean } = {}
): string {
  switch (format) {
    case 'json':
      return formatJson(modules);

    case 'quiet':
      return formatQuiet(modules.map((m) => m.slug));

    case 'table':
    default:
      if (modules.length === 0) {
        return 'No modules found.';
      }

      return formatTable(
        ['Module', 'Name', 'Status'],
        modules.map((m) => [m.slug, m.name, formatStatus(m.activated, options)]),
        options
      );
  }
}

export interface FailedSite {
  siteId: number;
  siteUrl: string;
  error: RemoteErrorPayload;
}

/**
 * Table of sites whose part of a batch request failed
 */
export function formatFailedSites(
  title: string,
  failed: FailedSite[],
  options: { noColor?: boolean } = {}
): string {
  const heading = options.noColor ? title : chalk.red.bold(title);
  const rows = failed.map((f) => [
    String(f.siteId),
    f.siteUrl,
    [f.error.error, f.error.message].filter((part) => typeof part === 'string' && part.length > 0).join(': ') ||
      'Unknown error',
  ]);

  return `${heading}\n${formatTable(['Site ID', 'Site URL', 'Error'], rows, options)}`;
}
