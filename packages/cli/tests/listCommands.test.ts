/**
 * jetpack:list-sites and jetpack:list-site-modules Tests
 */

import { listSiteModules } from '../src/commands/listSiteModules';
import { listSites } from '../src/commands/listSites';
import { InvalidInputError } from '../src/errors';
import { FakeSiteDirectory, createContext, makeSite } from './fakes';

const sites = [
  makeSite(1, 'https://a.example.com', 'Site A'),
  makeSite(2, 'https://a-staging.wpcomstaging.com', 'Site A Staging'),
];

const modules = [
  { slug: 'stats', name: 'Jetpack Stats', activated: true },
  { slug: 'protect', name: 'Protect', activated: false },
];

describe('listSites', () => {
  it('lists every site', async () => {
    const ctx = createContext({ directory: new FakeSiteDirectory(sites), options: { quiet: true } });

    const result = await listSites(ctx, {});

    expect(result).toHaveLength(2);
    expect(ctx.output.lines).toEqual(['a.example.com\na-staging.wpcomstaging.com']);
  });

  it('leaves out staging sites when asked', async () => {
    const ctx = createContext({
      directory: new FakeSiteDirectory(sites),
      options: { json: true },
      excludedDomains: ['wpcomstaging.com'],
    });

    await listSites(ctx, { excludeStaging: true });

    expect(JSON.parse(ctx.output.lines[0])).toEqual([
      { id: 1, url: 'https://a.example.com', domain: 'a.example.com', name: 'Site A' },
    ]);
  });
});

describe('listSiteModules', () => {
  function createDirectory() {
    return new FakeSiteDirectory(sites, new Map(), new Map([[1, modules]]));
  }

  it('lists all modules by default', async () => {
    const ctx = createContext({ directory: createDirectory(), options: { quiet: true } });

    const result = await listSiteModules(ctx, { site: 'a.example.com' });

    expect(result).toEqual(modules);
    expect(ctx.output.lines).toEqual(['stats\nprotect']);
  });

  it('filters by status', async () => {
    const ctx = createContext({ directory: createDirectory(), options: { quiet: true } });

    const result = await listSiteModules(ctx, { site: '1', status: 'off' });

    expect(result.map((m) => m.slug)).toEqual(['protect']);
  });

  it('rejects an unknown status filter before any remote call', async () => {
    const directory = createDirectory();

    await expect(
      listSiteModules(createContext({ directory }), { site: 'a.example.com', status: 'enabled' })
    ).rejects.toBeInstanceOf(InvalidInputError);
    expect(directory.calls).toEqual([]);
  });
});
