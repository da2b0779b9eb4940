/**
 * Maps a canonical property name to the name used on the wire
 */
export type NamingPolicy = (propertyName: string) => string;

export type NamingPolicyName =
  | 'camelCase'
  | 'snake_case_lower'
  | 'snake_case_upper'
  | 'kebab_case_lower'
  | 'kebab_case_upper';

const WORD_PATTERN = /[A-Z]+(?![a-z])|[A-Z]?[a-z]+|\d+/g;

/**
 * Splits an identifier into words on case boundaries, digits and separators
 * (ProductName -> Product, Name; HTTPServer -> HTTP, Server; unit_price -> unit, price)
 */
export function splitWords(propertyName: string): string[] {
  return propertyName.match(WORD_PATTERN) ?? [];
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

function camelCase(propertyName: string): string {
  const words = splitWords(propertyName);
  if (words.length === 0) return propertyName;

  const [first, ...rest] = words;
  return first.toLowerCase() + rest.map(capitalize).join('');
}

function joinWords(separator: string, upper: boolean): NamingPolicy {
  return propertyName => {
    const words = splitWords(propertyName);
    if (words.length === 0) return propertyName;

    const joined = words.join(separator);
    return upper ? joined.toUpperCase() : joined.toLowerCase();
  };
}

/**
 * Built-in naming policies
 */
export const NamingPolicies: Readonly<Record<NamingPolicyName, NamingPolicy>> = {
  camelCase,
  snake_case_lower: joinWords('_', false),
  snake_case_upper: joinWords('_', true),
  kebab_case_lower: joinWords('-', false),
  kebab_case_upper: joinWords('-', true),
};

export const NAMING_POLICY_NAMES = [
  'camelCase',
  'snake_case_lower',
  'snake_case_upper',
  'kebab_case_lower',
  'kebab_case_upper',
] as const satisfies readonly NamingPolicyName[];
