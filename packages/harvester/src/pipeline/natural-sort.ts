type KeyedNumber = {
  value: string;
  key: number;
};

export function compareStrings(left: string, right: string): number {
  if (left < right) {
    return -1;
  }

  return left > right ? 1 : 0;
}

/**
 * Numeric value of every digit in a house number, read as one number:
 * `"12a"` is 12, `"3/1"` is 31, `"a"` is 0. Undefined once the digits no
 * longer fit a safe integer.
 */
export function houseNumberKey(value: string): number | undefined {
  const digits = value.replace(/[^0-9]/g, '');
  if (!digits) {
    return 0;
  }

  const key = Number(digits);
  return Number.isSafeInteger(key) ? key : undefined;
}

/**
 * Sorts house numbers by their numeric key, ties by the full string.
 * Falls back to plain string order for the whole list when any entry has
 * no usable key.
 */
export function sortHouseNumbers(numbers: Iterable<string>): string[] {
  const keyed: KeyedNumber[] = [];
  const values = [...numbers];

  for (const value of values) {
    const key = houseNumberKey(value);
    if (key === undefined) {
      return values.sort(compareStrings);
    }

    keyed.push({ value, key });
  }

  return keyed
    .sort(
      (left, right) =>
        left.key - right.key || compareStrings(left.value, right.value),
    )
    .map((entry) => entry.value);
}
