// Pure formatting functions: no I/O.

import type { Observation } from "./domain.ts";
import type { HttpError, MarketDataError } from "./market-data.ts";
import type { MalformedObservation } from "./observation.ts";
import type { CycleReport, SymbolFailure } from "./refresh-coordinator.ts";

// --- ANSI escape codes ---

const GREEN = "\x1b[32m";
const RED = "\x1b[31m";
const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const RESET = "\x1b[0m";

// --- Snapshot summary ---

export interface SymbolSummary {
  readonly symbol: string;
  readonly points: number;
  readonly historical: number;
  readonly first: Observation;
  readonly last: Observation;
}

/** Group a snapshot by symbol, keeping the order symbols first appear. */
export function summarize(
  snapshot: ReadonlyArray<Observation>,
): ReadonlyArray<SymbolSummary> {
  const groups = new Map<string, Observation[]>();
  for (const observation of snapshot) {
    const group = groups.get(observation.symbol);
    if (group === undefined) groups.set(observation.symbol, [observation]);
    else group.push(observation);
  }

  return [...groups].map(([symbol, observations]) => ({
    symbol,
    points: observations.length,
    historical: observations.filter((o) => o.isHistorical).length,
    first: observations[0],
    last: observations[observations.length - 1],
  }));
}

/** HH:MM:SS of a stored timestamp. */
export function formatTime(timestamp: number): string {
  return new Date(timestamp).toISOString().slice(11, 19);
}

export function formatSummaryRow(summary: SymbolSummary): string {
  const change = summary.last.price - summary.first.price;
  const changePercent =
    summary.first.price === 0 ? 0 : (change / summary.first.price) * 100;
  const direction = change >= 0 ? "▲" : "▼";
  const color = change >= 0 ? GREEN : RED;
  const sign = change >= 0 ? "+" : "";

  return [
    `  ${BOLD}${summary.symbol.padEnd(6)}${RESET}`,
    `${BOLD}${summary.last.price.toFixed(2).padStart(10)}${RESET}`,
    `${color}${direction} ${sign}${change.toFixed(2)} (${sign}${changePercent.toFixed(2)}%)${RESET}`,
    `${DIM}${summary.points} pts, ${summary.historical} hist, ${formatTime(summary.last.timestamp)}${RESET}`,
  ].join("  ");
}

export function formatSnapshot(snapshot: ReadonlyArray<Observation>): string {
  const summaries = summarize(snapshot);
  if (summaries.length === 0) {
    return ["", `  ${DIM}No data yet${RESET}`, ""].join("\n");
  }
  return ["", ...summaries.map(formatSummaryRow), ""].join("\n");
}

// --- Cycle report ---

export function formatCycleReport(report: CycleReport): string {
  const stale = report.failures.filter((f) => f.stage === "live").length;
  const header =
    `  ${DIM}${formatTime(report.completedAt)}${RESET}  ` +
    `${report.appended.length}/${report.symbols.length} updated` +
    (report.backfilled.length > 0
      ? `, backfilled ${report.backfilled.join(", ")}`
      : "") +
    (stale > 0 ? `, ${RED}${stale} stale${RESET}` : "");

  return [header, ...report.failures.map(formatFailure)].join("\n");
}

export function formatFailure(failure: SymbolFailure): string {
  const friendly = classifyError(failure.error);
  return `  ${RED}✗ ${failure.symbol} (${failure.stage}): ${friendly.title}${RESET}  ${DIM}${friendly.hint}${RESET}`;
}

// --- Error classification ---

interface ClassifiedError {
  readonly title: string;
  readonly hint: string;
}

function classifyError(
  error: MarketDataError | MalformedObservation,
): ClassifiedError {
  switch (error._tag) {
    case "NetworkError":
      return {
        title: "Network error",
        hint: "Could not reach the data provider. Check your internet connection.",
      };
    case "HttpError":
      return classifyHttpError(error);
    case "SymbolNotFound":
      return {
        title: "Symbol not found",
        hint: "Double-check the ticker symbol (e.g. AAPL, SPY, MSFT).",
      };
    case "ServiceError":
      return {
        title: "Service unavailable",
        hint: error.message,
      };
    case "ParseError":
      return {
        title: "Unexpected response",
        hint: "The provider returned data in an unexpected format.",
      };
    case "MalformedObservation":
      return {
        title: "No usable price",
        hint: error.message,
      };
  }
}

function classifyHttpError(error: HttpError): ClassifiedError {
  if (error.status === 404) {
    return {
      title: "Symbol not found",
      hint: "Double-check the ticker symbol (e.g. AAPL, SPY, MSFT).",
    };
  }
  if (error.status === 429) {
    return {
      title: "Rate limited",
      hint: "Too many requests. Consider a longer refresh interval.",
    };
  }
  if (error.status >= 500 && error.status < 600) {
    return {
      title: "Server error",
      hint: "The data provider is having issues. Showing the last buffered data.",
    };
  }
  return {
    title: "HTTP error",
    hint: `HTTP ${error.status}`,
  };
}
