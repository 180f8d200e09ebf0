import dayjs from "dayjs";
import { z } from "zod";

export const FLIGHT_INTENTS = ["cheapest", "price_range", "earliest", "direct", "default"] as const;
export const FlightIntentSchema = z.enum(FLIGHT_INTENTS);
export type FlightIntent = z.infer<typeof FlightIntentSchema>;

const IsoDateSchema = z
  .string()
  .trim()
  // Must format back unchanged: dayjs rolls 2026-02-30 over to 2026-03-02.
  .refine((value) => /^\d{4}-\d{2}-\d{2}$/.test(value) && dayjs(value).format("YYYY-MM-DD") === value, {
    message: "Expected a YYYY-MM-DD date."
  });

const LocationCodeSchema = z
  .string()
  .trim()
  .min(3)
  .max(8)
  .transform((value) => value.toUpperCase());

const PriceBoundSchema = z
  .number()
  .nonnegative()
  .nullish()
  .transform((value) => value ?? null);

export const FlightQuerySchema = z
  .object({
    origin: LocationCodeSchema,
    destination: LocationCodeSchema,
    departDate: IsoDateSchema,
    returnDate: IsoDateSchema.nullish().transform((value) => value ?? null),
    passengers: z.number().int().positive().max(9).default(1),
    cabinClass: z.string().trim().min(1).default("ECONOMY"),
    currency: z
      .string()
      .trim()
      .length(3)
      .transform((value) => value.toUpperCase())
      .default("INR"),
    limit: z.number().int().min(0).default(10),
    minPrice: PriceBoundSchema,
    maxPrice: PriceBoundSchema,
    intent: z.string().trim().toLowerCase().default("cheapest"),
    region: z.string().trim().nullish().transform((value) => value ?? null),
    airline: z.string().trim().nullish().transform((value) => value ?? null)
  })
  .superRefine((query, ctx) => {
    if (query.minPrice !== null && query.maxPrice !== null && query.minPrice > query.maxPrice) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["minPrice"],
        message: "minPrice must not exceed maxPrice."
      });
    }
    if (query.returnDate && dayjs(query.returnDate).isBefore(dayjs(query.departDate))) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["returnDate"],
        message: "returnDate must not be before departDate."
      });
    }
  });

export type FlightQueryInput = z.input<typeof FlightQuerySchema>;
export type FlightQuery = Readonly<z.infer<typeof FlightQuerySchema>>;

// Unknown or empty intents rank like "default" (ascending price).
export function resolveIntent(intent: string | null | undefined): FlightIntent {
  const parsed = FlightIntentSchema.safeParse(intent?.trim().toLowerCase());
  return parsed.success ? parsed.data : "default";
}
