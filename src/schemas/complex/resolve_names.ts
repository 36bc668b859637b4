import { isReservedName } from "../declared.ts";

const NAME_PATTERN = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

/**
 * Checks if the given name is a valid record identifier.
 * @param name - The name to validate.
 * @returns True if the name is valid, false otherwise.
 */
export function isValidName(name: string): boolean {
  return NAME_PATTERN.test(name);
}

/**
 * Anything registered under a name.
 */
export interface Named {
  getName(): string;
}

/**
 * Namespace of records that may reference each other by name.
 *
 * A field declared as the string `"Node"` resolves to the record registered
 * here under that name, which lets a record refer to one defined after it.
 */
export class RecordRegistry<T extends Named = Named> {
  readonly #entries = new Map<string, T>();

  /**
   * Adds a record under its name.
   * @throws Error if the name is reserved or already taken.
   */
  public register(entry: T): void {
    const name = entry.getName();
    if (isReservedName(name)) {
      throw new Error(`Cannot register a record under built-in name: ${name}`);
    }
    const existing = this.#entries.get(name);
    if (existing !== undefined && existing !== entry) {
      throw new Error(`Duplicate record name: ${name}`);
    }
    this.#entries.set(name, entry);
  }

  /**
   * Looks up a record by name.
   */
  public get(name: string): T | undefined {
    return this.#entries.get(name);
  }

  /**
   * Names of every registered record.
   */
  public names(): string[] {
    return Array.from(this.#entries.keys());
  }
}
