/**
 * CLI Integration Tests
 *
 * Drives the commander program in process with fake collaborators.
 * These tests validate command-line argument parsing, help output and exit codes.
 */

import { createProgram, reportCommandError } from '../src/program';
import { FleetConfig } from '../src/config';
import { CommandError, InvalidInputError } from '../src/errors';
import { CapturedOutput, FakeSiteDirectory, ScriptedPrompter, makeSite } from './fakes';

const config: FleetConfig = {
  apiUrl: 'https://wpcom.test',
  apiToken: 'test-token',
  timeout: 1000,
  excludedDomains: ['wpcomstaging.com'],
};

interface Harness {
  output: CapturedOutput;
  directory: FakeSiteDirectory;
  prompter: ScriptedPrompter;
  exit: jest.Mock<void, [number]>;
  run(...args: string[]): Promise<void>;
}

function createHarness(options: { confirm?: boolean } = {}): Harness {
  const output = new CapturedOutput();
  const directory = new FakeSiteDirectory(
    [makeSite(1, 'https://a.example.com', 'Site A'), makeSite(2, 'https://a-staging.wpcomstaging.com', 'Staging')],
    new Map(),
    new Map([[1, [{ slug: 'stats', name: 'Jetpack Stats', activated: true }]]])
  );
  const prompter = new ScriptedPrompter([], options.confirm ?? false);
  const exit = jest.fn<void, [number]>();

  return {
    output,
    directory,
    prompter,
    exit,
    async run(...args: string[]) {
      const program = createProgram({
        loadConfig: () => config,
        createDirectory: () => directory,
        createPrompter: () => prompter,
        output,
        exit,
      });
      program.exitOverride();
      await program.parseAsync(args, { from: 'user' });
    },
  };
}

describe('CLI', () => {
  describe('help and version', () => {
    it('lists every command in the help', () => {
      const help = createProgram().helpInformation();

      expect(help).toContain('Usage: wpfleet');
      expect(help).toContain('jetpack:list-sites');
      expect(help).toContain('jetpack:list-site-modules');
      expect(help).toContain('jetpack:set-site-module-status|jetpack:toggle-site-module');
      expect(help).toContain('jetpack:export-site-plugins');
    });

    it('reports the package version', () => {
      expect(createProgram().version()).toBe('1.0.0');
    });
  });

  describe('global options', () => {
    it('prints JSON with --json', async () => {
      const harness = createHarness();

      await harness.run('--json', 'jetpack:list-sites', '--exclude-staging');

      expect(JSON.parse(harness.output.lines[0])).toEqual([
        { id: 1, url: 'https://a.example.com', domain: 'a.example.com', name: 'Site A' },
      ]);
      expect(harness.exit).not.toHaveBeenCalled();
    });

    it('prints slugs with --quiet', async () => {
      const harness = createHarness();

      await harness.run('--quiet', 'jetpack:list-site-modules', 'a.example.com', '--status', 'on');

      expect(harness.output.lines).toEqual(['stats']);
    });
  });

  describe('jetpack:set-site-module-status', () => {
    it('exits with 2 when confirmation is declined', async () => {
      const harness = createHarness({ confirm: false });

      await harness.run('--no-color', 'jetpack:set-site-module-status', 'a.example.com', 'stats', 'off');

      expect(harness.exit).toHaveBeenCalledWith(2);
      expect(harness.output.lines).toEqual(['⚠ Command aborted by user.']);
      expect(harness.directory.updates).toEqual([]);
    });

    it('accepts the toggle alias with --yes', async () => {
      const harness = createHarness();

      await harness.run('--no-color', 'jetpack:toggle-site-module', '1', 'stats', 'off', '--yes');

      expect(harness.prompter.confirmations).toEqual([]);
      expect(harness.directory.updates).toEqual([{ siteId: 1, settings: { stats: false } }]);
      expect(harness.output.lines[1]).toBe('✓ Module status updated successfully.');
      expect(harness.exit).not.toHaveBeenCalled();
    });

    it('exits with 1 on an invalid status', async () => {
      const harness = createHarness();

      await harness.run('--no-color', 'jetpack:set-site-module-status', 'a.example.com', 'stats', 'maybe');

      expect(harness.exit).toHaveBeenCalledWith(1);
      expect(harness.output.errors).toEqual(['✗ Invalid value "maybe" for status. Allowed values: on, off']);
      expect(harness.directory.calls).toEqual([]);
    });
  });

  describe('configuration', () => {
    it('exits with 1 when no API token is configured', async () => {
      const harness = createHarness();
      const program = createProgram({
        loadConfig: () => ({ ...config, apiToken: null }),
        createPrompter: () => harness.prompter,
        output: harness.output,
        exit: harness.exit,
      });

      await program.parseAsync(['--no-color', 'jetpack:list-sites'], { from: 'user' });

      expect(harness.exit).toHaveBeenCalledWith(1);
      expect(harness.output.errors[0]).toMatch(/^✗ No API token configured\. Set WPFLEET_API_TOKEN/);
    });
  });
});

describe('reportCommandError', () => {
  it('uses the exit code carried by command errors', () => {
    const output = new CapturedOutput();

    expect(reportCommandError(new CommandError('Broken', 2), output, { noColor: true })).toBe(2);
    expect(output.errors).toEqual(['✗ Broken']);
  });

  it('maps input errors to 1', () => {
    const output = new CapturedOutput();

    expect(reportCommandError(InvalidInputError.missing('site'), output, { noColor: true })).toBe(1);
    expect(output.errors).toEqual(['✗ Missing required value for site']);
  });

  it('maps unknown errors to 1', () => {
    const output = new CapturedOutput();

    expect(reportCommandError('boom', output, { noColor: true })).toBe(1);
    expect(output.errors).toEqual(['✗ boom']);
  });
});
