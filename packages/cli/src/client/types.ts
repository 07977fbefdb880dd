/**
 * Types for the WordPress.com site directory
 */

export interface Site {
  id: number;
  url: string;
  domain: string;
  name: string;
}

export interface SiteModule {
  slug: string;
  name: string;
  activated: boolean;
}

export interface PluginEntry {
  /** Plugin file relative to the plugins directory, e.g. `akismet/akismet.php` */
  file: string;
  name: string;
  version: string;
  active: boolean;
}

export interface RemoteErrorPayload {
  error?: string;
  message?: string;
  [key: string]: unknown;
}

/**
 * Outcome of one site inside a batch request
 */
export type BatchResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: RemoteErrorPayload };

/**
 * Read/write operations the commands need from the remote API
 */
export interface SiteDirectory {
  listSites(): Promise<Site[]>;
  getSite(idOrDomain: string): Promise<Site>;
  getSitePluginsBatch(siteIds: number[]): Promise<Map<number, BatchResult<PluginEntry[]>>>;
  getSiteModules(siteId: number): Promise<SiteModule[]>;
  updateSiteModules(siteId: number, settings: Record<string, boolean>): Promise<boolean>;
}
