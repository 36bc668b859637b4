import type { PathSegment } from "../schemas/error.ts";
import { setOwn } from "../schemas/json.ts";

/**
 * Marker returned when a path does not exist in a value.
 */
export const MISSING: unique symbol = Symbol("MISSING");

/**
 * Type of {@link MISSING}.
 */
export type Missing = typeof MISSING;

const SEGMENT = /\.?([A-Za-z_$][\w$-]*)|\[(-?\d+)\]|\[(["'])((?:\\.|(?!\3).)*)\3\]/y;

/**
 * Parses `a.b[0]["c.d"]` into `["a", "b", 0, "c.d"]`.
 */
export function parseObjectPath(path: string): PathSegment[] {
  const segments: PathSegment[] = [];
  SEGMENT.lastIndex = 0;
  let offset = 0;
  while (offset < path.length) {
    SEGMENT.lastIndex = offset;
    const match = SEGMENT.exec(path);
    if (!match || (offset === 0 && match[0].startsWith("."))) {
      throw new Error(`Invalid object path '${path}' at offset ${offset}`);
    }
    if (match[1] !== undefined) {
      segments.push(match[1]);
    } else if (match[2] !== undefined) {
      segments.push(Number(match[2]));
    } else {
      segments.push(match[4].replace(/\\(.)/g, "$1"));
    }
    offset = SEGMENT.lastIndex;
  }
  if (segments.length === 0) {
    throw new Error("Object path must not be empty");
  }
  return segments;
}

/**
 * Follows a path through maps and sequences; negative indices count from
 * the end. Returns {@link MISSING} when any step is absent.
 */
export function getAtPath(
  data: unknown,
  path: readonly PathSegment[],
): unknown {
  let current: unknown = data;
  for (const segment of path) {
    if (typeof segment === "number") {
      if (!Array.isArray(current)) return MISSING;
      const index = segment < 0 ? current.length + segment : segment;
      if (index < 0 || index >= current.length) return MISSING;
      current = current[index];
    } else {
      if (
        typeof current !== "object" || current === null ||
        Array.isArray(current) || !Object.hasOwn(current, segment)
      ) {
        return MISSING;
      }
      current = Reflect.get(current, segment);
    }
  }
  return current;
}

/**
 * Writes `value` at `path`, creating intermediate maps (or sequences, when
 * the next segment is an index) as needed.
 */
export function setAtPath<T>(
  target: { [key: string]: T },
  path: readonly PathSegment[],
  value: T,
  container: (index: boolean) => T,
): void {
  let current: unknown = target;
  for (let i = 0; i < path.length; i++) {
    const segment = path[i];
    const last = i === path.length - 1;
    if (typeof current !== "object" || current === null) {
      throw new Error(`Cannot write through a scalar at segment ${String(segment)}`);
    }
    if (last) {
      setOwn(current, segment, value);
      return;
    }
    let next: unknown = Object.hasOwn(current, segment)
      ? Reflect.get(current, segment)
      : undefined;
    if (typeof next !== "object" || next === null) {
      next = container(typeof path[i + 1] === "number");
      setOwn(current, segment, next);
    }
    current = next;
  }
}
