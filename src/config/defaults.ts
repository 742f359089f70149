export const DEFAULT_LOG_FILE = "instance-inventory.log";

export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

/**
 * Regions swept when no explicit list is configured.
 */
export const DEFAULT_REGIONS: readonly string[] = Object.freeze([
  "us-east-2",
  "us-east-1",
  "us-west-1",
  "us-west-2",
  "af-south-1",
  "ap-east-1",
  "ap-south-1",
  "ap-northeast-3",
  "ap-northeast-2",
  "ap-southeast-1",
  "ap-southeast-2",
  "ap-northeast-1",
  "ca-central-1",
  "eu-central-1",
  "eu-west-1",
  "eu-west-2",
  "eu-south-1",
  "eu-west-3",
  "eu-north-1",
  "me-south-1",
  "sa-east-1",
]);
