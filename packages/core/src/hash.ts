/**
 * Config fingerprints and run identifiers.
 * FNV-1a over the key-sorted JSON of the config.
 */

export function hashConfig(config: object): string {
  const json = JSON.stringify(config, Object.keys(config).sort());
  let hash = 0x811c9dc5;
  for (let i = 0; i < json.length; i++) {
    hash ^= json.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return (hash >>> 0).toString(16).padStart(8, "0");
}

/** `<tag>_<yyyymmddhhmmss>` — sortable, so run directories list in start order. */
export function runId(tag: string, now = new Date()): string {
  const ts = now.toISOString().replace(/[-:T]/g, "").slice(0, 14);
  return `${tag}_${ts}`;
}
