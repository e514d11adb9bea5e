/**
 * Short, human-readable name for a value's type, used in error messages,
 * log fields and `toString()` output.
 *
 * @example
 * typeName(new Counter()); // 'Counter'
 * typeName(Object.create(null)); // 'object'
 * typeName(42); // 'number'
 */
export function typeName(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  if (typeof value === 'function') {
    return value.name ? `function ${value.name}` : 'function';
  }
  if (typeof value !== 'object') {
    return typeof value;
  }

  const proto: unknown = Object.getPrototypeOf(value);
  if (
    typeof proto === 'object' &&
    proto !== null &&
    'constructor' in proto &&
    typeof proto.constructor === 'function' &&
    proto.constructor.name.length > 0
  ) {
    return proto.constructor.name;
  }
  return 'object';
}
