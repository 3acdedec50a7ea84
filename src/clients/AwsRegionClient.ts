import { DescribeRegionsCommand, EC2Client } from '@aws-sdk/client-ec2';
import { Region } from '../types';
import { IRegionClient } from '../interfaces';

/**
 * EC2-backed region listing
 */
export class AwsRegionClient implements IRegionClient {
  private client: EC2Client;

  constructor(client?: EC2Client) {
    // Default region resolution comes from the environment (AWS_REGION / shared config)
    this.client = client ?? new EC2Client({ maxAttempts: 1 });
  }

  async listRegions(): Promise<Region[]> {
    const response = await this.client.send(new DescribeRegionsCommand({ AllRegions: true }));

    const regions: Region[] = [];
    for (const region of response.Regions ?? []) {
      if (!region.RegionName) {
        continue;
      }
      regions.push({
        name: region.RegionName,
        enabled: region.OptInStatus !== 'not-opted-in',
        optInStatus: region.OptInStatus
      });
    }
    return regions;
  }

  destroy(): void {
    this.client.destroy();
  }
}
