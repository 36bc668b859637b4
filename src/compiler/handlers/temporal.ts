import { format, fromUnixTime, getUnixTime, isValid, parse, parseISO, startOfDay } from "date-fns";
import type { TemporalDescriptor } from "../../descriptors/descriptor.ts";
import { PatternParseError, TypeMismatchError } from "../../schemas/error.ts";
import type { KindHandler } from "../context.ts";

/**
 * Label of the canonical form in parse errors.
 */
export const CANONICAL_FORM = "ISO 8601";

const DATE_FORMAT = "yyyy-MM-dd";

// Fields a pattern leaves out are taken from this date.
const REFERENCE_DATE = new Date(2000, 0, 1);

/**
 * `datetime` and `date` values, held in memory as `Date`.
 *
 * Strings are read as ISO 8601 first and then through each custom pattern
 * in order; numbers are Unix timestamps in seconds. `date` values are
 * truncated to local midnight.
 */
export const temporalHandler: KindHandler<TemporalDescriptor> = {
  emitLoad(descriptor) {
    const { origin, patterns } = descriptor;
    const tried = [CANONICAL_FORM, ...patterns];
    const normalize = (date: Date): Date =>
      origin === "date" ? startOfDay(date) : date;

    return (value) => {
      if (value instanceof Date) {
        if (!isValid(value)) {
          throw new TypeMismatchError(origin, value, "invalid date");
        }
        return normalize(new Date(value.getTime()));
      }
      if (typeof value === "number") {
        if (!Number.isFinite(value)) {
          throw new TypeMismatchError(origin, value, "not a finite timestamp");
        }
        return normalize(fromUnixTime(value));
      }
      if (typeof value !== "string") {
        throw new TypeMismatchError(origin, value);
      }
      const text = value.trim();
      const iso = parseISO(text);
      if (isValid(iso)) {
        return normalize(iso);
      }
      for (const pattern of patterns) {
        const parsed = parse(text, pattern, REFERENCE_DATE);
        if (isValid(parsed)) {
          return normalize(parsed);
        }
      }
      throw new PatternParseError(value, tried);
    };
  },

  emitDump(descriptor, ctx) {
    const { origin } = descriptor;
    const asTimestamp = ctx.config.dateTimeOutputForm === "timestamp";
    return (value) => {
      if (!(value instanceof Date) || !isValid(value)) {
        throw new TypeMismatchError(origin, value);
      }
      if (origin === "date") {
        return asTimestamp ? getUnixTime(startOfDay(value)) : format(value, DATE_FORMAT);
      }
      return asTimestamp ? value.getTime() / 1000 : value.toISOString();
    };
  },

  emitGuard() {
    return (value) => value instanceof Date;
  },
};
