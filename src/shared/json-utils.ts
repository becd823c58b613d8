/**
 * JSON.stringify replacer that renders BigInt values (block numbers, token
 * amounts in decoded event args) as decimal strings.
 */
export const bigIntReplacer = (_key: string, value: unknown): unknown => {
  if (typeof value === 'bigint') {
    return value.toString();
  }
  return value;
};

export const toJson = (value: unknown): string => JSON.stringify(value, bigIntReplacer);
