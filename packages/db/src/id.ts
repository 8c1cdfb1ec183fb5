import KSUID from "ksuid";

/** Length of the base62 string form of a KSUID. */
const KSUID_LENGTH = 27;

function normalizeTag(tag: string): string {
  return tag
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9_]/g, "_")
    .replace(/^_+|_+$/g, "");
}

/**
 * KSUID-based id generator.
 *
 * - With no tag: `<27-char KSUID>`
 * - With tag: `tenant_<27-char KSUID>`
 */
export function generateId(tag = ""): string {
  const ksuid = KSUID.randomSync().string;
  const safeTag = normalizeTag(tag);
  return safeTag ? `${safeTag}_${ksuid}` : ksuid;
}

/**
 * True when `value` has the shape `generateId(tag)` produces.
 *
 * Only the shape is checked; the KSUID payload is not decoded.
 */
export function isTaggedId(value: string, tag: string): boolean {
  const safeTag = normalizeTag(tag);
  const body = safeTag ? value.slice(safeTag.length + 1) : value;
  if (safeTag && !value.startsWith(`${safeTag}_`)) return false;
  return body.length === KSUID_LENGTH && /^[0-9A-Za-z]+$/.test(body);
}

export const TENANT_ID_TAG = "tenant";
export const OPPORTUNITY_ID_TAG = "opp";

export const isTenantId = (value: string) => isTaggedId(value, TENANT_ID_TAG);
export const isOpportunityId = (value: string) => isTaggedId(value, OPPORTUNITY_ID_TAG);
