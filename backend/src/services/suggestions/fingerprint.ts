import { createHash } from "crypto";
import stringify from "fast-json-stable-stringify";
import { SUGGESTION_CACHE_PREFIX } from "../../config/constants";
import { normalizeParameters, type NormalizedParameters, type RequestParameters } from "./params";

// Bump when the canonical shape changes so old entries stop matching.
const FINGERPRINT_VERSION = 1;

/**
 * Cache key for a suggestion request: `ai_suggestions:<md5 hex>`.
 *
 * MD5 is used as a fast 128-bit spreader over a non-adversarial key space.
 * Do not reuse it for anything security-sensitive.
 */
export function fingerprint(params: RequestParameters): string {
  return fingerprintNormalized(normalizeParameters(params));
}

export function fingerprintNormalized(normalized: NormalizedParameters): string {
  const canonical = stringify({ v: FINGERPRINT_VERSION, ...normalized });
  const digest = createHash("md5").update(canonical, "utf8").digest("hex");
  return `${SUGGESTION_CACHE_PREFIX}:${digest}`;
}
