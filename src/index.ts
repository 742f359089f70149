/**
 * Library entry point. The CLI lives in cli.ts.
 */
export * from "./types";
export * from "./services";
export { toInstance, toNetworkInterface, RawInstanceSchema, RawNetworkInterfaceSchema } from "./normalize";
export type { NormalizeContext, RawInstance, RawNetworkInterface } from "./normalize";
export { createEC2Client, createEC2ListingClient, ec2ClientFactory, EC2ListingClient } from "./aws/clients";
export type { EC2ClientOptions } from "./aws/clients";
export { toRegionAccessError } from "./aws/errors";
export * from "./utils/errors";
export { parseIpAddress, validateRegion } from "./utils/validation";
export { DEFAULT_REGIONS } from "./config/defaults";
export type { InventoryConfig, InventoryConfigOptions } from "./config/types";
