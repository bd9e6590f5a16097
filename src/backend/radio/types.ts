/** Propagation forecast for one HF band group, e.g. `80m-40m`. */
export interface BandCondition {
  name: string;
  day: string;
  night: string;
}

/** Solar/propagation report as published by the upstream feed. */
export interface SolarReport {
  updated: string;
  /** Sorted by band name. */
  bands: BandCondition[];
}

/** One Parks on the Air activation spot. */
export interface Spot {
  activator: string;
  name: string;
  locationDesc: string;
  /** Upper-cased mode as reported; empty when the spotter gave none. */
  mode: string;
  frequencyHz: number;
  spotTime: Date;
}

/** Result type of every query key the radio client understands. */
export interface RadioQueryResults {
  solar: SolarReport;
  spots: Spot[];
}

export type RadioQueryKey = keyof RadioQueryResults;

/** Anything that can answer radio queries; implemented by the cached client. */
export interface RadioQuery {
  query<K extends RadioQueryKey>(key: K): Promise<RadioQueryResults[K]>;
}
