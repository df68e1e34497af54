export const PATH_SEPARATOR = '/';

const SEGMENT = /^[A-Za-z0-9_-]+$/;

export function isPath(value: string): boolean {
  return value.length > 0 && value.split(PATH_SEPARATOR).every((segment) => SEGMENT.test(segment));
}

/** Namespaces a dimension as `prefix/dim` when a prefix is configured. */
export function withPrefix(dim: string, prefix?: string): string {
  return prefix ? `${prefix}${PATH_SEPARATOR}${dim}` : dim;
}
