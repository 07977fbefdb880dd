/**
 * Fleet Site Filtering
 */

import { Site } from '../client/types';

/**
 * Returns the excluded domain the URL contains, or null if none
 */
export function matchExcludedDomain(url: string, excludedDomains: readonly string[]): string | null {
  for (const domain of excludedDomains) {
    if (domain.length > 0 && url.includes(domain)) {
      return domain;
    }
  }
  return null;
}

/**
 * Drop sites whose URL contains any excluded domain; each remaining site
 * appears once, in directory order.
 */
export function filterExcludedSites(sites: Site[], excludedDomains: readonly string[]): Site[] {
  const seen = new Set<number>();

  return sites.filter((site) => {
    if (seen.has(site.id) || matchExcludedDomain(site.url, excludedDomains) !== null) {
      return false;
    }
    seen.add(site.id);
    return true;
  });
}
