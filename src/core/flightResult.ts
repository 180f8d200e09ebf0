import { z } from "zod";

export const FlightResultSchema = z.object({
  provider: z.string(),
  providerFlightId: z.string(),
  origin: z.string(),
  destination: z.string(),
  airline: z.string(),
  departureTime: z.string(),
  arrivalTime: z.string(),
  stops: z.number().int().min(0),
  price: z.number(),
  currency: z.string(),
  cabinClass: z.string()
});

export type FlightResult = Readonly<z.infer<typeof FlightResultSchema>>;

export const FlightResultListSchema = z.array(FlightResultSchema);
