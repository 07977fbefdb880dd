/**
 * In-process stand-ins for the command collaborators
 */

import { BatchResult, PluginEntry, Site, SiteDirectory, SiteModule } from '../src/client/types';
import { CommandContext, Output } from '../src/commands/context';
import { Prompter, Question } from '../src/input/prompter';

export class FakeSiteDirectory implements SiteDirectory {
  calls: string[] = [];
  updates: Array<{ siteId: number; settings: Record<string, boolean> }> = [];
  updateResult = true;

  constructor(
    public sites: Site[] = [],
    public plugins: Map<number, BatchResult<PluginEntry[]>> = new Map(),
    public modules: Map<number, SiteModule[]> = new Map()
  ) {}

  async listSites(): Promise<Site[]> {
    this.calls.push('listSites');
    return this.sites;
  }

  async getSite(idOrDomain: string): Promise<Site> {
    this.calls.push(`getSite:${idOrDomain}`);
    const site = this.sites.find((s) => String(s.id) === idOrDomain || s.domain === idOrDomain);
    if (!site) {
      throw new Error(`Unknown site ${idOrDomain}`);
    }
    return site;
  }

  async getSitePluginsBatch(siteIds: number[]): Promise<Map<number, BatchResult<PluginEntry[]>>> {
    this.calls.push(`getSitePluginsBatch:${siteIds.join(',')}`);
    const results = new Map<number, BatchResult<PluginEntry[]>>();
    for (const id of siteIds) {
      const result = this.plugins.get(id);
      if (result) results.set(id, result);
    }
    return results;
  }

  async getSiteModules(siteId: number): Promise<SiteModule[]> {
    this.calls.push(`getSiteModules:${siteId}`);
    return this.modules.get(siteId) ?? [];
  }

  async updateSiteModules(siteId: number, settings: Record<string, boolean>): Promise<boolean> {
    this.calls.push(`updateSiteModules:${siteId}`);
    this.updates.push({ siteId, settings });
    return this.updateResult;
  }
}

/**
 * Answers questions from a fixed script, in order
 */
export class ScriptedPrompter implements Prompter {
  questions: Question[] = [];
  confirmations: string[] = [];

  constructor(
    private answers: Array<string | null> = [],
    private confirmAnswer = false
  ) {}

  async ask(question: Question): Promise<string | null> {
    this.questions.push(question);
    return this.answers.length > 0 ? this.answers.shift() ?? null : null;
  }

  async confirm(message: string): Promise<boolean> {
    this.confirmations.push(message);
    return this.confirmAnswer;
  }
}

export class CapturedOutput implements Output {
  lines: string[] = [];
  errors: string[] = [];

  log(message: string): void {
    this.lines.push(message);
  }

  error(message: string): void {
    this.errors.push(message);
  }
}

export function makeSite(id: number, url: string, name = `Site ${id}`): Site {
  return { id, url, domain: new URL(url).hostname, name };
}

export function createContext(
  overrides: Partial<CommandContext> & Pick<CommandContext, 'directory'>
): CommandContext & { output: CapturedOutput } {
  const output = new CapturedOutput();
  return {
    prompter: new ScriptedPrompter(),
    options: { noColor: true },
    autocomplete: true,
    excludedDomains: [],
    spin: (_text, task) => task(),
    ...overrides,
    output,
  };
}
