/**
 * Key casing policies applied to field names.
 *
 * `none` keeps the field name as written; `auto` (load only) tries the name
 * as written and then every other transform in {@link AUTO_CASING_ORDER}.
 */
export type KeyCasing = "none" | "camel" | "pascal" | "kebab" | "snake";

/**
 * Casing policy for load, which additionally accepts `auto`.
 */
export type LoadKeyCasing = KeyCasing | "auto";

/**
 * Order in which `auto` tries casing transforms.
 */
export const AUTO_CASING_ORDER: readonly KeyCasing[] = [
  "none",
  "camel",
  "pascal",
  "kebab",
  "snake",
];

const KEBAB_BOUNDARY = /((?!^)(?<!-)[A-Z][a-z]+|(?<=[a-z0-9])[A-Z])/g;
const SNAKE_BOUNDARY = /((?!^)(?<!_)[A-Z][a-z]+|(?<=[a-z0-9])[A-Z])/g;
const UNDERSCORE_NEXT = /_(.)/g;

function collapse(value: string, char: string): string {
  const doubled = char + char;
  let result = value;
  while (result.includes(doubled)) {
    result = result.replaceAll(doubled, char);
  }
  return result;
}

function isLowerCase(value: string): boolean {
  return value === value.toLowerCase() && value !== value.toUpperCase();
}

/**
 * Converts `device_type` to `deviceType`.
 */
export function toCamelCase(value: string): string {
  if (value.length === 0) return value;
  const normalized = collapse(value.replace(/[- ]/g, "_"), "_");
  return normalized[0].toLowerCase() +
    normalized.slice(1).replace(UNDERSCORE_NEXT, (_, c: string) =>
      c.toUpperCase()
    );
}

/**
 * Converts `device_type` to `DeviceType`.
 */
export function toPascalCase(value: string): string {
  if (value.length === 0) return value;
  const normalized = collapse(value.replace(/[- ]/g, "_"), "_");
  return normalized[0].toUpperCase() +
    normalized.slice(1).replace(UNDERSCORE_NEXT, (_, c: string) =>
      c.toUpperCase()
    );
}

/**
 * Converts `DeviceType` to `device-type`.
 */
export function toKebabCase(value: string): string {
  const normalized = value.replace(/[_ ]/g, "-");
  if (isLowerCase(normalized)) {
    return collapse(normalized, "-");
  }
  return collapse(normalized.replace(KEBAB_BOUNDARY, "-$1").toLowerCase(), "-");
}

/**
 * Converts `DeviceType` to `device_type`.
 */
export function toSnakeCase(value: string): string {
  const normalized = value.replace(/[- ]/g, "_");
  if (isLowerCase(normalized)) {
    return collapse(normalized, "_");
  }
  return collapse(normalized.replace(SNAKE_BOUNDARY, "_$1").toLowerCase(), "_");
}

/**
 * Applies a casing policy to a field name.
 */
export function applyCasing(casing: KeyCasing, name: string): string {
  switch (casing) {
    case "none":
      return name;
    case "camel":
      return toCamelCase(name);
    case "pascal":
      return toPascalCase(name);
    case "kebab":
      return toKebabCase(name);
    case "snake":
      return toSnakeCase(name);
  }
}
