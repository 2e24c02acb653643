
export function isObject(val: unknown): val is Record<string, unknown> {
  return (
    (val !== null)
    && ((typeof val) === 'object')
  );
}

export function isNumber(val: unknown): val is number {
  if(typeof val !== 'number') {
    return false;
  }
  return !isNaN(val);
}

export function isString(val: unknown): val is string {
  return (typeof val) === 'string';
}

export function isBigInt(val: unknown): val is bigint {
  return (typeof val) === 'bigint';
}

export function isBoolean(val: unknown): val is boolean {
  return (typeof val) === 'boolean';
}

export function isDate(val: unknown): val is Date {
  return isObject(val) && (val instanceof Date);
}
