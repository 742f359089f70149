export interface InventoryConfig {
  regions: string[];
  profile?: string;
  pageSize?: number;
  requestTimeoutMs: number;
  logFile: string;
  accountId?: string;
}

export interface InventoryConfigOptions {
  regions?: string[];
  profile?: string;
  pageSize?: number;
  requestTimeoutMs?: number;
  logFile?: string;
}
