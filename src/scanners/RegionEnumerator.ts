import { Region, RegionScope } from '../types';
import { IRegionClient, IRegionEnumerator } from '../interfaces';
import { DiscoveryError, formatErrorMessage } from '../errors';
import { RetryPolicy } from '../utils/RetryPolicy';

const REGION_NAME_PATTERN = /^[a-z]{2}(-[a-z]+)+-\d+$/;

export function isValidRegionName(name: string): boolean {
  return REGION_NAME_PATTERN.test(name);
}

/**
 * Resolves the run scope into the ordered list of regions to process
 */
export class RegionEnumerator implements IRegionEnumerator {
  private regionClient: IRegionClient;
  private retryPolicy: RetryPolicy;

  constructor(regionClient: IRegionClient, retryPolicy: RetryPolicy = new RetryPolicy()) {
    this.regionClient = regionClient;
    this.retryPolicy = retryPolicy;
  }

  async resolve(scope: RegionScope): Promise<Region[]> {
    if (scope.kind === 'explicit') {
      return this.resolveExplicit(scope.regions);
    }
    return this.listEnabledRegions();
  }

  /**
   * List enabled regions sorted by name
   */
  async listEnabledRegions(): Promise<Region[]> {
    let regions: Region[];
    try {
      regions = await this.retryPolicy.execute(() => this.regionClient.listRegions(), 'DescribeRegions');
    } catch (error) {
      throw new DiscoveryError(`Failed to enumerate regions: ${formatErrorMessage(error)}`, { cause: error });
    }

    const enabled = regions
      .filter(region => region.enabled)
      .sort((a, b) => a.name.localeCompare(b.name));

    if (enabled.length === 0) {
      throw new DiscoveryError('No enabled regions returned for this account', { type: 'validation' });
    }

    return enabled;
  }

  private resolveExplicit(names: string[]): Region[] {
    const unique = [...new Set(names.map(name => name.trim()).filter(name => name.length > 0))];

    if (unique.length === 0) {
      throw new DiscoveryError('Explicit region scope is empty', { type: 'validation' });
    }

    const invalid = unique.filter(name => !isValidRegionName(name));
    if (invalid.length > 0) {
      throw new DiscoveryError(`Invalid region name(s): ${invalid.join(', ')}`, { type: 'validation' });
    }

    return unique.map(name => ({ name, enabled: true }));
  }
}
