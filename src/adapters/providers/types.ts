import type { FlightQuery } from "../../core/flightQuery";
import type { FlightResult } from "../../core/flightResult";

/**
 * One upstream flight source. `search` resolves to an empty list instead of
 * rejecting when the provider is down, so one failing source never aborts
 * aggregation.
 */
export type FlightAdapter = {
  readonly name: string;
  supports(query: FlightQuery): boolean;
  search(query: FlightQuery): Promise<FlightResult[]>;
};
