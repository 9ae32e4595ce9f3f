type ParsedQueryKey =
  | { kind: 'street'; prefix: string }
  | { kind: 'house-number'; street: string; prefix: string };

// Street prefixes are letters only, so a trailing `#digits` always marks a house-number key
const HOUSE_NUMBER_KEY_PATTERN = /^(.*)#(\d+)$/s;

export function streetQueryKey(prefix: string): string {
  return prefix;
}

export function houseNumberQueryKey(street: string, prefix: string): string {
  return `${street}#${prefix}`;
}

export function parseQueryKey(key: string): ParsedQueryKey {
  const match = HOUSE_NUMBER_KEY_PATTERN.exec(key);
  const street = match?.[1];
  const prefix = match?.[2];

  if (street !== undefined && prefix !== undefined) {
    return { kind: 'house-number', street, prefix };
  }

  return { kind: 'street', prefix: key };
}

export type { ParsedQueryKey };
