import { Region } from '../types';

/**
 * Interface for account-wide region metadata
 */
export interface IRegionClient {
  /**
   * List every region known to the account, including opt-in regions that are not enabled
   */
  listRegions(): Promise<Region[]>;

  destroy?(): void;
}
