export { toInstance } from './instance';
export { toNetworkInterface, type NormalizeContext } from './networkInterface';
export { RawInstanceSchema, RawNetworkInterfaceSchema } from './schema';
export type { RawInstance, RawNetworkInterface } from './schema';
