/**
 * WordPress.com REST Client
 *
 * Talks to the WPCOM public API (and its Jetpack proxy endpoints) on
 * behalf of the commands.
 */

import { RemoteFailureError, getErrorMessage } from '../errors';
import {
  BatchResult,
  PluginEntry,
  RemoteErrorPayload,
  Site,
  SiteDirectory,
  SiteModule,
} from './types';

export interface WpcomClientOptions {
  apiUrl: string;
  apiToken: string;
  timeout?: number;
}

type RequestMethod = 'GET' | 'POST';

interface RequestOptions {
  query?: Record<string, string>;
  body?: Record<string, unknown>;
}

const SITE_FIELDS = 'ID,URL,name';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isAbortError(error: unknown): boolean {
  return isRecord(error) && error.name === 'AbortError';
}

/**
 * Host part of a site URL, falling back to the URL without its scheme
 */
export function getDomain(url: string): string {
  try {
    return new URL(url).hostname;
  } catch {
    return url.replace(/^[a-z]+:\/\//i, '').split('/')[0];
  }
}

/**
 * Parse a WPCOM site object ({ ID, URL, name })
 */
export function parseSite(raw: unknown): Site | null {
  if (!isRecord(raw)) return null;

  const id = typeof raw.ID === 'number' ? raw.ID : Number(raw.ID);
  if (!Number.isInteger(id) || typeof raw.URL !== 'string') return null;

  return {
    id,
    url: raw.URL,
    domain: getDomain(raw.URL),
    name: typeof raw.name === 'string' ? raw.name : '',
  };
}

function parsePluginEntry(raw: unknown): PluginEntry | null {
  if (!isRecord(raw) || typeof raw.file !== 'string') return null;

  return {
    file: raw.file,
    name: typeof raw.name === 'string' ? raw.name : '',
    version: typeof raw.version === 'string' ? raw.version : '',
    active: raw.active === true,
  };
}

/**
 * Decide the outcome of one site's batch payload.
 *
 * A list is the plugin payload; an object is an error. Anything else is
 * neither and the site is left out of the result.
 */
export function toBatchResult(payload: unknown): BatchResult<PluginEntry[]> | null {
  if (Array.isArray(payload)) {
    const value = payload
      .map(parsePluginEntry)
      .filter((entry): entry is PluginEntry => entry !== null);
    return { ok: true, value };
  }

  if (isRecord(payload)) {
    const error: RemoteErrorPayload = { ...payload };
    return { ok: false, error };
  }

  return null;
}

export class WpcomClient implements SiteDirectory {
  private apiUrl: string;
  private apiToken: string;
  private timeout: number;

  constructor(options: WpcomClientOptions) {
    this.apiUrl = options.apiUrl.replace(/\/+$/, '');
    this.apiToken = options.apiToken;
    this.timeout = options.timeout || 30000;
  }

  /**
   * List the Jetpack-connected sites the token can manage
   */
  async listSites(): Promise<Site[]> {
    const data = await this.request('GET', '/rest/v1.1/me/sites', {
      query: { filters: 'jetpack', fields: SITE_FIELDS },
    });

    if (!isRecord(data) || !Array.isArray(data.sites)) {
      throw new RemoteFailureError('Unexpected response when listing sites');
    }

    return data.sites.map(parseSite).filter((site): site is Site => site !== null);
  }

  /**
   * Look up one site by numeric ID or domain
   */
  async getSite(idOrDomain: string): Promise<Site> {
    const data = await this.request('GET', `/rest/v1.1/sites/${encodeURIComponent(idOrDomain)}`, {
      query: { fields: SITE_FIELDS },
    });

    const site = parseSite(data);
    if (!site) {
      throw new RemoteFailureError(`Unexpected response when fetching site "${idOrDomain}"`);
    }
    return site;
  }

  /**
   * Fetch the installed plugins of many sites in a single request
   */
  async getSitePluginsBatch(siteIds: number[]): Promise<Map<number, BatchResult<PluginEntry[]>>> {
    const results = new Map<number, BatchResult<PluginEntry[]>>();
    if (siteIds.length === 0) {
      return results;
    }

    const data = await this.request('GET', '/rest/v1.1/jetpack-blogs/plugins', {
      query: { site_ids: siteIds.join(',') },
    });

    if (!isRecord(data)) {
      throw new RemoteFailureError('Unexpected response when fetching plugins');
    }

    for (const [key, payload] of Object.entries(data)) {
      const siteId = Number(key);
      const result = toBatchResult(payload);
      if (Number.isInteger(siteId) && result) {
        results.set(siteId, result);
      }
    }

    return results;
  }

  async getSiteModules(siteId: number): Promise<SiteModule[]> {
    const data = await this.request('GET', `/rest/v1.1/jetpack-blogs/${siteId}/rest-api/`, {
      query: { path: '/jetpack/v4/module/all' },
    });

    const modules = isRecord(data) && isRecord(data.data) ? data.data : data;
    if (!isRecord(modules)) {
      return [];
    }

    return Object.entries(modules).map(([slug, module]) => ({
      slug,
      name: isRecord(module) && typeof module.name === 'string' ? module.name : slug,
      activated: isRecord(module) && module.activated === true,
    }));
  }

  /**
   * Update Jetpack module settings; true only when the site reports success
   */
  async updateSiteModules(siteId: number, settings: Record<string, boolean>): Promise<boolean> {
    const data = await this.request('POST', `/rest/v1.1/jetpack-blogs/${siteId}/rest-api/`, {
      body: {
        path: '/jetpack/v4/settings',
        json: true,
        body: JSON.stringify(settings),
      },
    });

    return isRecord(data) && isRecord(data.data) && data.data.code === 'success';
  }

  /**
   * Execute a request against the API and return the decoded JSON body
   */
  private async request(method: RequestMethod, path: string, options: RequestOptions = {}): Promise<unknown> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    const search = options.query ? `?${new URLSearchParams(options.query).toString()}` : '';
    const headers: Record<string, string> = {
      Accept: 'application/json',
      Authorization: `Bearer ${this.apiToken}`,
    };
    if (options.body) {
      headers['Content-Type'] = 'application/json';
    }

    try {
      const response = await fetch(`${this.apiUrl}${path}${search}`, {
        method,
        headers,
        body: options.body ? JSON.stringify(options.body) : undefined,
        signal: controller.signal,
      });

      clearTimeout(timeoutId);

      const text = await response.text();
      let data: unknown = null;
      if (text.length > 0) {
        try {
          data = JSON.parse(text);
        } catch {
          data = null;
        }
      }

      if (!response.ok) {
        const message = isRecord(data) && typeof data.message === 'string' ? data.message : response.statusText;
        const code = isRecord(data) && typeof data.error === 'string' ? data.error : undefined;
        throw new RemoteFailureError(`HTTP ${response.status}: ${message}`, response.status, code);
      }

      return data;
    } catch (error: unknown) {
      clearTimeout(timeoutId);

      if (isAbortError(error)) {
        throw new RemoteFailureError('Request timed out');
      }

      if (error instanceof RemoteFailureError) {
        throw error;
      }

      throw new RemoteFailureError(getErrorMessage(error));
    }
  }
}
