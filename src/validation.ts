import { addHours, isValid, parseISO } from "date-fns";
import { z } from "zod";
import { ValidationError } from "./errors";

const PLATE_RE = /^[A-ZА-ЯІЇЄҐ]{2}\d{4}[A-ZА-ЯІЇЄҐ]{2}$/;

const MAX_YEAR = 9999;

const amountSchema = z
  .string()
  .trim()
  .transform((text) => text.replace(/,/g, "."))
  .pipe(z.string().regex(/^(\d+(\.\d*)?|\.\d+)$/))
  .transform(Number)
  .pipe(z.number().finite().positive());

const isoDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/)
  .refine((text) => isValid(parseISO(text)));

export function cleanText(text: string, emptyMessage: string): string {
  const value = text.trim();
  if (!value) throw new ValidationError(emptyMessage);
  return value;
}

/** Accepts "100", "100.5", "100,50", ".5" and "12."; anything not strictly positive is rejected. */
export function parseAmount(text: string): number {
  const result = amountSchema.safeParse(text);
  if (!result.success) {
    throw new ValidationError("Некоректна сума. Введіть число > 0.");
  }
  return result.data;
}

export function normalizePlate(text: string): string {
  return text.trim().toUpperCase().replace(/\s+/g, "");
}

export function isValidPlate(plate: string): boolean {
  return PLATE_RE.test(plate);
}

export function parsePlate(text: string): string {
  const plate = normalizePlate(text);
  if (!isValidPlate(plate)) {
    throw new ValidationError(
      "Невірний формат номера. Спробуйте у форматі BC1234AB.",
    );
  }
  return plate;
}

export interface ReportRange {
  from: string;
  to: string;
  start: Date;
  endExclusive: Date;
}

/**
 * Parses "YYYY-MM-DD,YYYY-MM-DD" into a UTC range. The end date is
 * inclusive for the user, so the returned bound is midnight after it.
 */
export function parseReportRange(text: string): ReportRange {
  const parts = text
    .split(",")
    .map((part) => part.trim())
    .filter(Boolean);
  if (parts.length !== 2) {
    throw new ValidationError(
      "Невірний формат. Надішліть у вигляді: 2025-01-01,2025-01-31",
    );
  }

  const [from, to] = parts;
  if (
    !isoDateSchema.safeParse(from).success ||
    !isoDateSchema.safeParse(to).success
  ) {
    throw new ValidationError("Невірний формат дат. Спробуйте ще раз.");
  }

  const start = parseISO(`${from}T00:00:00Z`);
  const endExclusive = addHours(parseISO(`${to}T00:00:00Z`), 24);
  // stored timestamps compare as strings; a year past 9999 serializes as "+010000-…"
  if (endExclusive.getUTCFullYear() > MAX_YEAR) {
    throw new ValidationError("Невірний формат дат. Спробуйте ще раз.");
  }
  if (start >= endExclusive) {
    throw new ValidationError(
      "Початкова дата не може бути пізнішою за кінцеву.",
    );
  }
  return { from, to, start, endExclusive };
}
