import { RegionScan } from '../types';
import { IConfigServiceClient } from './IConfigServiceClient';

/**
 * Interface for read-only discovery of AWS Config resources
 */
export interface IResourceScanner {
  /**
   * Scan the client's region for its recorder, delivery channel and every Config rule
   */
  scanRegion(client: IConfigServiceClient): Promise<RegionScan>;
}
