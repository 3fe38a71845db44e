/**
 * Config hashing for naming and deduplicating sweep entries.
 * FNV-1a over a canonical rendering of the config — no crypto needed.
 *
 * The rendering is JSON-like, but every value kind gets its own spelling so
 * distinct configs never render alike: bigints end in `n`, non-finite
 * numbers are bare `NaN`/`Infinity`/`-Infinity`, and Sets and Maps list their
 * entries. Object keys, Set members and Map entries are sorted, so insertion
 * order never changes the hash.
 */

const byRendering = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

function canonical(value: unknown): string {
  switch (typeof value) {
    case "string":
      return JSON.stringify(value);
    case "number":
      return Number.isFinite(value) ? JSON.stringify(value) : String(value);
    case "bigint":
      return `${value}n`;
    case "boolean":
      return String(value);
    case "undefined":
      return "undefined";
    case "symbol":
      return `Symbol(${JSON.stringify(value.description ?? "")})`;
    case "function":
      return "<function>";
  }
  if (value === null) return "null";
  if (typeof value !== "object") return String(value);
  if (Array.isArray(value)) return `[${value.map(canonical).join(",")}]`;
  if (value instanceof Set) {
    const members = [...value].map(canonical).sort(byRendering);
    return `Set{${members.join(",")}}`;
  }
  if (value instanceof Map) {
    const entries = [...value].map(([k, v]) => `${canonical(k)}=>${canonical(v)}`).sort(byRendering);
    return `Map{${entries.join(",")}}`;
  }
  if (value instanceof Date) return `Date(${value.getTime()})`;
  const parts = Object.entries(value)
    .filter(([, v]) => v !== undefined && typeof v !== "function")
    .map(([k, v]) => `${JSON.stringify(k)}:${canonical(v)}`)
    .sort(byRendering);
  return `{${parts.join(",")}}`;
}

/** Order-independent hash: `{a:1,b:2}` and `{b:2,a:1}` hash the same. */
export function hashConfig(config: Record<string, unknown>): string {
  const text = canonical(config);
  let hash = 0x811c9dc5;
  for (let i = 0; i < text.length; i++) {
    hash ^= text.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return (hash >>> 0).toString(16).padStart(8, "0");
}
