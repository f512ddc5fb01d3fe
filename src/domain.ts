// Pure domain types: no framework dependency, no I/O.

/** One price sample for a symbol, as stored in the buffer. */
export interface Observation {
  readonly symbol: string;
  readonly timestamp: number; // epoch ms, UTC wall clock, no zone attached
  readonly price: number;
  readonly volume: number;
  readonly isHistorical: boolean;
}

/** One point of a historical series as a provider returns it. */
export interface HistoricalBar {
  readonly timestamp: number; // epoch ms
  readonly close: number | null;
  readonly volume: number | null;
}

/** Latest quote for a symbol as a provider returns it. */
export interface LiveQuote {
  readonly price: number | null;
  readonly volume: number | null;
}
