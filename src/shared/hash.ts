import { createHash } from "crypto";

/** Hex SHA-256 of a UTF-8 string or raw bytes. */
export function sha256Hex(data: string | Buffer): string {
  const hash = createHash("sha256");
  if (typeof data === "string") hash.update(data, "utf8");
  else hash.update(data);
  return hash.digest("hex");
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function sortKeysDeep(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortKeysDeep);
  if (!isPlainObject(value)) return value;
  return Object.fromEntries(
    Object.keys(value)
      .sort()
      .map((key) => [key, sortKeysDeep(value[key])])
  );
}

/**
 * JSON with object keys sorted at every depth. Undefined properties are
 * dropped, as JSON.stringify does, so an absent field and an undefined one
 * hash the same.
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(sortKeysDeep(value));
}

/** SHA-256 over the canonical JSON of a record. */
export function contentHash(value: unknown): string {
  return sha256Hex(canonicalJson(value));
}

/**
 * Merkle root of a list of hex hashes. Pairs are hashed as the concatenated
 * hex strings; an odd hash at the end of a level is paired with itself.
 */
export function merkleRoot(hashes: readonly string[]): string {
  if (hashes.length === 0) return sha256Hex("");
  let level = [...hashes];
  while (level.length > 1) {
    const next: string[] = [];
    for (let i = 0; i < level.length; i += 2) {
      const left = level[i];
      next.push(sha256Hex(left + (level[i + 1] ?? left)));
    }
    level = next;
  }
  return level[0];
}
