import { z } from "zod";
import { EVENT_FORMATS, EVENT_STORE } from "../config/index.ts";
import type { EventMeta, NewEventInput, ValidationResult } from "../types.ts";
import {
  isBareFilename,
  isValidCalendarDate,
  isValidClockTime,
  isValidUrl,
} from "./data-validation.ts";

// Two schemas live here. `eventMetaSchema` reads a meta.json written by hand or by
// the scaffolder and is lenient about absent values (null, "" and missing all
// mean "not set"). `newEventInputSchema` checks what a user typed before the
// scaffolder touches the disk, so it also insists on a title.

const blankToUndefined = (value: string | null | undefined) =>
  value && value.trim() ? value.trim() : undefined;

const optionalText = z.string().nullish().transform(blankToUndefined);

const calendarDate = z
  .string({
    required_error: "Date is required",
    invalid_type_error: "Date must be a string",
  })
  .trim()
  .refine(isValidCalendarDate, (value) => ({
    message: `Bad date format: "${value}" (expected YYYY-MM-DD)`,
  }));

const clockTime = optionalText.refine(
  (value) => value === undefined || isValidClockTime(value),
  (value) => ({ message: `Bad time format: "${value}" (expected HH:MM)` }),
);

const httpUrl = optionalText.refine(
  (value) =>
    value === undefined ||
    isValidUrl(value, { allowProtocol: EVENT_FORMATS.URL_PROTOCOLS }),
  (value) => ({ message: `Invalid URL: "${value}"` }),
);

export const eventMetaSchema = z.object({
  title: z.string().nullish().transform((value) => value?.trim() ?? ""),
  date: calendarDate,
  time: clockTime,
  location: optionalText,
  description: optionalText,
  ticket_url: httpUrl,
  promoter_url: httpUrl,
  coupon_code: optionalText,
  image: optionalText
    .transform((value) => value ?? EVENT_STORE.DEFAULT_IMAGE)
    .refine(isBareFilename, (value) => ({
      message: `Image must be a file name inside the event folder: "${value}"`,
    })),
});

export const newEventInputSchema = z.object({
  title: z
    .string({ required_error: "Title is required" })
    .trim()
    .min(1, "Title is required"),
  date: calendarDate,
  time: clockTime,
  location: optionalText,
  description: optionalText,
  ticket_url: httpUrl,
  promoter_url: httpUrl,
  coupon_code: optionalText,
  slug: optionalText,
  imagePath: optionalText,
});

export type ParsedNewEventInput = z.output<typeof newEventInputSchema>;

/**
 * Turn zod issues into `path: message` strings.
 */
export function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Copy only the set fields, in canonical order, so serialized records are stable.
 */
function toEventMeta(parsed: z.output<typeof eventMetaSchema>): EventMeta {
  return {
    title: parsed.title,
    date: parsed.date,
    ...(parsed.time !== undefined && { time: parsed.time }),
    ...(parsed.location !== undefined && { location: parsed.location }),
    ...(parsed.description !== undefined && {
      description: parsed.description,
    }),
    ...(parsed.ticket_url !== undefined && { ticket_url: parsed.ticket_url }),
    ...(parsed.promoter_url !== undefined && {
      promoter_url: parsed.promoter_url,
    }),
    ...(parsed.coupon_code !== undefined && {
      coupon_code: parsed.coupon_code,
    }),
    image: parsed.image,
  };
}

export function validateEventMeta(raw: unknown): ValidationResult<EventMeta> {
  const result = eventMetaSchema.safeParse(raw);

  if (!result.success) {
    return { success: false, errors: formatZodIssues(result.error) };
  }

  return { success: true, data: toEventMeta(result.data) };
}

export function validateNewEventInput(
  raw: NewEventInput | Record<string, unknown>,
): ValidationResult<ParsedNewEventInput> {
  const result = newEventInputSchema.safeParse(raw);

  if (!result.success) {
    return { success: false, errors: formatZodIssues(result.error) };
  }

  return { success: true, data: result.data };
}
