/**
 * Helpers for attribute and plug names as written in scene files.
 */

/** Drops the leading `.` or `-` an attribute name may be written with. */
export function attributeShortName(name: string): string {
  return name.startsWith('.') || name.startsWith('-') ? name.slice(1) : name;
}

/**
 * Element count of a plug name with a trailing `[i:j]` slice, 1 otherwise.
 */
export function plugElementCount(plug: string): number {
  const open: number = plug.lastIndexOf('[');
  const close: number = plug.lastIndexOf(']');
  if (open === -1 || close === -1 || open > close) {
    return 1;
  }
  const bounds: string[] = plug.slice(open + 1, close).split(':');
  if (bounds.length < 2) {
    return 1;
  }
  const count: number = Number.parseInt(bounds[1], 10) - Number.parseInt(bounds[0], 10) + 1;
  return Number.isFinite(count) && count > 0 ? count : 1;
}
