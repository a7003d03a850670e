const UNSAFE = /[^a-z0-9._-]+/g;

/**
 * Lower-cased, filesystem-safe form of a description: anything outside
 * `[a-z0-9._-]` collapses to `_`, leading/trailing separators are dropped.
 */
export function slugify(text: string | undefined | null, fallback = "scenario"): string {
  const normalised = (text ?? "").trim().toLowerCase();
  if (!normalised) return fallback;
  const safe = normalised.replace(UNSAFE, "_").replace(/^[._-]+|[._-]+$/g, "");
  return safe || fallback;
}
