export type FlightKind = 'departure' | 'destination';

export const FLIGHT_KINDS: readonly FlightKind[] = ['departure', 'destination'];

export type FetchUnit = {
  airport: string; // ICAO, 4 letters
  date: string;    // YYYY-MM-DD
  kind: FlightKind;
};

/** Unix epoch seconds, both ends inclusive. */
export type TimeWindow = {
  begin: number;
  end: number;
};

export type AccessToken = {
  value: string;
  expiresAt: number; // epoch ms
};

/** One element of the OpenSky flights array. Every field may be missing. */
export type FlightPayload = {
  icao24?: string | null;
  firstSeen?: number | null;
  lastSeen?: number | null;
  estDepartureAirport?: string | null;
  estArrivalAirport?: string | null;
  callsign?: string | null;
  estDepartureAirportHorizDistance?: number | null;
  estDepartureAirportVertDistance?: number | null;
  estArrivalAirportHorizDistance?: number | null;
  estArrivalAirportVertDistance?: number | null;
  departureAirportCandidatesCount?: number | null;
  arrivalAirportCandidatesCount?: number | null;
};

export type FlightRow = {
  airport: string;
  date: string;
  kind: FlightKind;
  icao24: string;
  first_seen: number;
  last_seen: number | null;
  est_departure_airport: string | null;
  est_arrival_airport: string | null;
  callsign: string | null;
  est_departure_airport_horiz_distance: number | null;
  est_departure_airport_vert_distance: number | null;
  est_arrival_airport_horiz_distance: number | null;
  est_arrival_airport_vert_distance: number | null;
  departure_airport_candidates_count: number | null;
  arrival_airport_candidates_count: number | null;
};

export type ExportFormat = 'csv' | 'arrow';

export type FlightFilters = {
  departureAirports?: string[];
  arrivalAirports?: string[];
  startDate?: string; // YYYY-MM-DD, inclusive
  endDate?: string;   // YYYY-MM-DD, inclusive
  kind?: FlightKind;
};

export type RunSummary = {
  total: number;
  skipped: number;
  fetched: number;
  failed: number;
  flights: number;
};
