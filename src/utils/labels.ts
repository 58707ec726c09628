/**
 * Label normalisation shared by the registry, the blueprint compiler, the
 * input mapper and the dispatcher. Every lookup in the host compares labels
 * through {@link normalizeLabel}, so the function must stay deterministic and
 * free of locale-dependent behaviour.
 */

/**
 * Upper-cases every letter that starts the word or follows a non-letter and
 * lower-cases the others, so `"2nd"` becomes `"2Nd"` and `"ipv4address"`
 * becomes `"Ipv4Address"`.
 */
function titleCase(word: string): string {
  return word
    .toLowerCase()
    .replace(/(^|\P{L})(\p{L})/gu, (_match, prefix: string, letter: string) => prefix + letter.toUpperCase());
}

/**
 * Converts a snake_case or space separated label to camelCase. Leading
 * separators produce an empty first segment, so `" url"` yields `"Url"`.
 */
export function toCamelCase(value: string): string {
  const parts = value.replace(/ /g, "_").toLowerCase().split("_");
  const [head = "", ...rest] = parts;
  return head + rest.map(titleCase).join("");
}

/**
 * Canonical identity of a display label.
 *
 * ```ts
 * normalizeLabel("To website"); // "to_website"
 * normalizeLabel("website ");   // "website"
 * normalizeLabel("my-function-name"); // "my_function_name"
 * normalizeLabel("myFunctionName"); // "myfunctionname"
 * ```
 */
export function normalizeLabel(raw: string): string {
  const camel = toCamelCase(raw.replace(/-/g, "_"));
  const split = camel.replace(/([a-z0-9])([A-Z])/g, "$1_$2");
  return split.replace(/__+/g, "_").toLowerCase();
}

/** True when both labels share the same normalised identity. */
export function labelsMatch(left: string, right: string): boolean {
  return normalizeLabel(left) === normalizeLabel(right);
}
