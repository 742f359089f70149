import { RegionAccessError, type RegionAccessCategory } from "../utils/errors";
import { isRecord } from "../utils/validation";

function readStringField(obj: unknown, field: string): string | null {
  if (!isRecord(obj)) return null;
  const value = obj[field];
  if (typeof value !== "string") return null;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

function readNumberField(obj: unknown, field: string): number | null {
  if (!isRecord(obj)) return null;
  const value = obj[field];
  if (typeof value !== "number" || !Number.isFinite(value)) return null;
  return value;
}

function extractHttpStatus(err: unknown): number | null {
  // SDK v3 service exceptions carry the response status under $metadata.
  const metadata = isRecord(err) ? err.$metadata : undefined;
  return readNumberField(metadata, "httpStatusCode");
}

function extractErrorCode(err: unknown): string {
  // Service exceptions use `name` for the AWS error code; Node socket errors use `code`.
  return readStringField(err, "code") ?? readStringField(err, "name") ?? readStringField(err, "Code") ?? "";
}

function extractMessage(err: unknown): string {
  if (err instanceof Error) return err.message || "unknown error";
  return readStringField(err, "message") ?? String(err);
}

const NETWORK_CODES = new Set(["ENOTFOUND", "ECONNRESET", "ECONNREFUSED", "ETIMEDOUT", "EAI_AGAIN", "EPIPE"]);
const NETWORK_NAMES = new Set(["TimeoutError", "AbortError", "RequestTimeout", "RequestTimeoutException"]);

function looksLikeNetworkError(err: unknown): boolean {
  const code = readStringField(err, "code") ?? "";
  if (NETWORK_CODES.has(code)) return true;
  if (NETWORK_NAMES.has(readStringField(err, "name") ?? "")) return true;
  const message = extractMessage(err).toLowerCase();
  if (message.includes("socket hang up")) return true;
  return [...NETWORK_CODES].some((c) => message.includes(c.toLowerCase()));
}

const SERVICE_CODES = new Set(["internalerror", "internalfailure", "serviceunavailable", "unavailable", "requestlimitexceeded"]);

function looksLikeServiceError(code: string, httpStatus: number | null): boolean {
  // Throttling and server-side faults.
  if (httpStatus === 429) return true;
  if (httpStatus !== null && httpStatus >= 500) return true;
  const c = code.toLowerCase();
  if (c.includes("throttling")) return true;
  if (c.includes("ratelimit") || c.includes("rate_limit")) return true;
  return SERVICE_CODES.has(c);
}

function looksLikeOptInError(code: string): boolean {
  // Opt-in regions that are not enabled for the account.
  return code === "OptInRequired" || code === "Blocked" || code === "PendingVerification";
}

function looksLikeAuthError(code: string, httpStatus: number | null): boolean {
  if (httpStatus === 401) return true;
  const c = code.toLowerCase();
  if (c === "credentialsprovidererror") return true;
  if (c.includes("authfailure")) return true;
  if (c.includes("invalidclienttokenid")) return true;
  if (c.includes("unrecognizedclient")) return true;
  if (c.includes("signaturedoesnotmatch")) return true;
  if (c.includes("expiredtoken") || c.includes("requestexpired")) return true;
  return false;
}

function looksLikePermissionError(code: string, httpStatus: number | null): boolean {
  if (httpStatus === 403) return true;
  const c = code.toLowerCase();
  return c.includes("unauthorizedoperation") || c.includes("accessdenied");
}

/**
 * Classify a failure raised while listing a region.
 *
 * Returns null for anything that is not an access, connectivity or service failure;
 * callers rethrow those.
 */
export function toRegionAccessError(err: unknown, region: string): RegionAccessError | null {
  if (err instanceof RegionAccessError) return err;

  const httpStatus = extractHttpStatus(err);
  const errorCode = extractErrorCode(err);

  let category: RegionAccessCategory | null = null;
  if (looksLikeServiceError(errorCode, httpStatus)) {
    category = "service";
  } else if (looksLikeNetworkError(err)) {
    category = "network";
  } else if (looksLikeOptInError(errorCode)) {
    category = "opt_in";
  } else if (looksLikeAuthError(errorCode, httpStatus)) {
    category = "auth";
  } else if (looksLikePermissionError(errorCode, httpStatus)) {
    category = "permission";
  }

  if (category === null) return null;

  return new RegionAccessError({
    region,
    category,
    errorCode,
    message: extractMessage(err),
    ...(httpStatus !== null ? { httpStatus } : {}),
    cause: err,
  });
}
