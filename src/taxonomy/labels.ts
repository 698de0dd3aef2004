/**
 * Conversions between the label forms of a taxonomy element.
 *
 *   model name   named thing        related to
 *   bare         NamedThing         related_to
 *   formatted    biolink:NamedThing biolink:related_to
 */

const PREFIXED = /^([A-Za-z][\w.-]*):([^/].*)$/;

export interface SplitLabel {
  prefix?: string;
  local: string;
}

export function splitPrefix(label: string): SplitLabel {
  const trimmed = label.trim();
  const match = PREFIXED.exec(trimmed);
  if (!match) {
    return { local: trimmed };
  }
  return { prefix: match[1], local: match[2] };
}

/**
 * Lookup key for any label form: prefix dropped, words split on camel case
 * and underscores, lower-cased.
 */
export function toModelName(label: string): string {
  return splitPrefix(label)
    .local.replace(/_/g, ' ')
    .replace(/([a-z0-9])([A-Z])/g, '$1 $2')
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1 $2')
    .replace(/\s+/g, ' ')
    .trim()
    .toLowerCase();
}

/** `gene or gene product` -> `GeneOrGeneProduct`, `RNA product` -> `RNAProduct` */
export function toClassName(modelName: string): string {
  return modelName
    .trim()
    .split(/\s+/)
    .filter((word) => word.length > 0)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join('');
}

/** `related to` -> `related_to` */
export function toSlotName(modelName: string): string {
  return modelName.trim().replace(/\s+/g, '_');
}

export function withPrefix(namespace: string, local: string): string {
  return `${namespace}:${local}`;
}

/**
 * Formatted form of a label the taxonomy does not know. Prefixed labels are
 * kept; unprefixed ones get the namespace, with model names turned into
 * class names.
 */
export function syntacticCanonical(label: string, namespace: string): string {
  const { prefix, local } = splitPrefix(label);
  if (prefix) {
    return withPrefix(prefix, local);
  }
  const looksLikeModelName = /\s/.test(local) || (!/[A-Z]/.test(local) && !local.includes('_'));
  return withPrefix(namespace, looksLikeModelName ? toClassName(local) : local);
}
