/**
 * Object-id format guard for the Graph client.
 *
 * Directory object ids are GUIDs. Anything else cannot exist upstream, so
 * the client answers "not found" without a round-trip and never splices an
 * arbitrary string into a request path.
 */

const GUID_RE =
  /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/** Returns `true` when `value` is a well-formed GUID string. */
export function isValidObjectId(value: string): boolean {
  return GUID_RE.test(value);
}
