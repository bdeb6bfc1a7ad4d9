// Link prefixes a channel reference may be pasted with
const LINK_PREFIXES = ["https://t.me/", "http://t.me/", "t.me/"] as const;

/**
 * Reduce a pasted channel link to the bare identifier the resolver expects:
 * "https://t.me/foo" -> "foo", "t.me/foo" -> "foo", "foo" -> "foo".
 *
 * Prefixes are matched case-sensitively at the start. Stripping repeats until
 * nothing changes, so the result is a fixed point. Anything else is returned
 * as-is; invalid identifiers are reported by resolution, not here.
 */
export function normalizeChannelReference(raw: string): string {
  let current = raw.trim();

  for (;;) {
    const prefix = LINK_PREFIXES.find((p) => current.startsWith(p));
    if (!prefix) return current;
    current = current.slice(prefix.length).trim();
  }
}
