/**
 * Helpers for the flat wire dictionary, where lists are written in indexed bracket
 * notation: `filters[0][fields]=name`, `filters[0][op]=eq`, ...
 */

export type QueryDictionary = Record<string, string>;

const LIST_KEY_PATTERN = /^(.+)\[(\d+)\]\[(.+)\]$/;

/**
 * Flattens a list of entries under a prefix: `prefix[index][key]`
 */
export function mergeListOfQueryStrings(
  prefix: string,
  entries: readonly Readonly<QueryDictionary>[],
): QueryDictionary {
  const result: QueryDictionary = {};

  entries.forEach((entry, index) => {
    for (const [key, value] of Object.entries(entry)) {
      result[`${prefix}[${index}][${key}]`] = value;
    }
  });

  return result;
}

/**
 * Collects the entries written under a prefix, ordered by their index.
 * Indices need not be contiguous.
 */
export function splitQueryStringInList(
  dictionary: Readonly<Record<string, string | undefined>>,
  prefix: string,
): QueryDictionary[] {
  const byIndex = new Map<number, QueryDictionary>();

  for (const [key, value] of Object.entries(dictionary)) {
    if (value === undefined) continue;

    const match = LIST_KEY_PATTERN.exec(key);
    if (!match || match[1] !== prefix) continue;

    const index = Number(match[2]);
    const entry = byIndex.get(index) ?? {};
    entry[match[3]] = value;
    byIndex.set(index, entry);
  }

  return [...byIndex.entries()].sort(([a], [b]) => a - b).map(([, entry]) => entry);
}

/**
 * Reads a query string into a dictionary; the first occurrence of a repeated key wins
 */
export function queryStringToDictionary(query: string | URLSearchParams): QueryDictionary {
  const params =
    typeof query === 'string' ? new URLSearchParams(query.replace(/^\?/, '')) : query;
  const result: QueryDictionary = {};

  params.forEach((value, key) => {
    if (!Object.hasOwn(result, key)) {
      result[key] = value;
    }
  });

  return result;
}

/**
 * Writes a dictionary as a query string, brackets left unescaped
 */
export function dictionaryToQueryString(dictionary: Readonly<QueryDictionary>): string {
  return Object.entries(dictionary)
    .map(([key, value]) => `${encodeKey(key)}=${encodeURIComponent(value)}`)
    .join('&');
}

function encodeKey(key: string): string {
  return encodeURIComponent(key).replace(/%5B/g, '[').replace(/%5D/g, ']');
}
