import { EC2Client, DescribeInstancesCommand } from "@aws-sdk/client-ec2";
import type { InstanceListingClient, InstancePage, RegionClientFactory } from "../types";
import { toRegionAccessError } from "./errors";

export interface EC2ClientOptions {
  profile?: string;
  // DescribeInstances MaxResults; the service default applies when unset.
  pageSize?: number;
  requestTimeoutMs?: number;
}

export function createEC2Client(region: string, options: EC2ClientOptions = {}): EC2Client {
  return new EC2Client({
    region,
    ...(options.profile ? { profile: options.profile } : {}),
  });
}

/**
 * Paged DescribeInstances for one region. Access and connectivity failures
 * surface as RegionAccessError; anything else is rethrown untouched.
 */
export class EC2ListingClient implements InstanceListingClient {
  constructor(
    private readonly client: EC2Client,
    private readonly region: string,
    private readonly options: EC2ClientOptions = {}
  ) {}

  async listInstances(nextToken?: string): Promise<InstancePage> {
    const command = new DescribeInstancesCommand({
      ...(nextToken ? { NextToken: nextToken } : {}),
      ...(this.options.pageSize ? { MaxResults: this.options.pageSize } : {}),
    });
    const timeoutMs = this.options.requestTimeoutMs;

    try {
      return await this.client.send(
        command,
        timeoutMs ? { abortSignal: AbortSignal.timeout(timeoutMs) } : {}
      );
    } catch (error) {
      throw toRegionAccessError(error, this.region) ?? error;
    }
  }
}

export function createEC2ListingClient(region: string, options: EC2ClientOptions = {}): EC2ListingClient {
  return new EC2ListingClient(createEC2Client(region, options), region, options);
}

export function ec2ClientFactory(options: EC2ClientOptions = {}): RegionClientFactory {
  return (region) => {
    try {
      return createEC2ListingClient(region, options);
    } catch (error) {
      throw toRegionAccessError(error, region) ?? error;
    }
  };
}
