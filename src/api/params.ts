/**
 * Wire parameter encoding for the control-panel API.
 */

export type WireValue = string | number | boolean | null | undefined;

export type WireParams = Record<string, WireValue>;

export type EmbeddedData = Record<string, string | number>;

/** Extra parameters passed through verbatim under their wire names. */
export type Passthrough = Record<string, string | number | boolean>;

export function encodeValue(value: string | number | boolean): string {
  if (typeof value === 'boolean') {
    return value ? '1' : '0';
  }
  return String(value);
}

/**
 * Appends parameters in insertion order. Absent values are dropped,
 * booleans become 1/0 and embedded data becomes `ED[key]=value`.
 */
export function appendParams(
  search: URLSearchParams,
  params: WireParams,
  embeddedData?: EmbeddedData
): URLSearchParams {
  for (const [name, value] of Object.entries(params)) {
    if (value === undefined || value === null) continue;
    search.set(name, encodeValue(value));
  }
  if (embeddedData) {
    for (const [key, value] of Object.entries(embeddedData)) {
      search.set(`ED[${key}]`, encodeValue(value));
    }
  }
  return search;
}

/** Joins list parameters the way the API expects them (comma separated). */
export function joinList(values: readonly string[] | undefined): string | undefined {
  return values && values.length > 0 ? values.join(',') : undefined;
}
