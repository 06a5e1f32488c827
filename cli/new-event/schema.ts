import { z } from "zod";
import type { NewEventInput } from "@promogen/shared";
import {
  type FlagOptions,
  optionalFlag,
  parseFlags,
  requiredFlag,
  validateFlags,
} from "../_shared/args.ts";

export const NEW_EVENT_FLAGS = {
  string: [
    "date",
    "title",
    "time",
    "location",
    "description",
    "coupon",
    "ticket",
    "promoter",
    "slug",
    "image",
    "events-dir",
  ],
} satisfies FlagOptions;

export const NEW_EVENT_USAGE = `Usage: promogen new --date YYYY-MM-DD --title <text> [options]

Create a new event folder with meta.json and cover.jpg.

Options:
      --date <YYYY-MM-DD>  Event date (required)
      --title <text>       Event title (required)
      --time <HH:MM>       Start time
      --location <text>    Venue
      --description <text> Longer description
      --coupon <code>      Discount code shown on the event page
      --ticket <url>       Ticket sales link
      --promoter <url>     Promoter or social link
      --slug <text>        Folder name suffix (default: from the title)
      --image <path>       Cover image, converted to JPEG when possible
      --events-dir <dir>   Events directory (default: ./events)`;

const newEventArgsSchema = z
  .object({
    date: requiredFlag,
    title: requiredFlag,
    time: optionalFlag,
    location: optionalFlag,
    description: optionalFlag,
    coupon: optionalFlag,
    ticket: optionalFlag,
    promoter: optionalFlag,
    slug: optionalFlag,
    image: optionalFlag,
    "events-dir": optionalFlag,
  })
  .transform((flags) => {
    const input: NewEventInput = {
      title: flags.title,
      date: flags.date,
      time: flags.time,
      location: flags.location,
      description: flags.description,
      coupon_code: flags.coupon,
      ticket_url: flags.ticket,
      promoter_url: flags.promoter,
      slug: flags.slug,
      imagePath: flags.image,
    };
    return { input, eventsDir: flags["events-dir"] };
  });

export type NewEventArgs = z.output<typeof newEventArgsSchema>;

export function parseNewEventArgs(argv: readonly string[]): NewEventArgs {
  return validateFlags(newEventArgsSchema, parseFlags(argv, NEW_EVENT_FLAGS));
}
