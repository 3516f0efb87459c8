import { InvalidRequestIdError } from "./errors";

/** Characters in front of the user UUID inside a request id. */
export const REQUEST_ID_PREFIX_LENGTH = 10;

const COMPACT_UUID = /^[0-9a-f]{32}$/i;
const DASHED_UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/**
 * Canonical (lower-case, dashed) user id carried by a request id. The UUID
 * may be written with or without dashes; its version and variant bits are
 * not checked.
 */
export function userIdFromRequestId(requestId: string): string {
  const raw = requestId.slice(REQUEST_ID_PREFIX_LENGTH);
  const hex = DASHED_UUID.test(raw) ? raw.replace(/-/g, "") : raw;

  if (!COMPACT_UUID.test(hex)) {
    throw new InvalidRequestIdError(requestId);
  }
  const id = hex.toLowerCase();
  return `${id.slice(0, 8)}-${id.slice(8, 12)}-${id.slice(12, 16)}-${id.slice(16, 20)}-${id.slice(20)}`;
}
