/**
 * Terminal output helpers for the CLI.
 */

import type { PeeringReport } from "../peering/types.js";
import type { ConnectivityReport } from "../topology/types.js";

export type OutputFormat = "json" | "table" | "markdown" | "text";

export const theme = {
  error: (s: string) => `\x1b[31m${s}\x1b[0m`,
  success: (s: string) => `\x1b[32m${s}\x1b[0m`,
  warn: (s: string) => `\x1b[33m${s}\x1b[0m`,
  muted: (s: string) => `\x1b[90m${s}\x1b[0m`,
} as const;

export function parseFormat(value: string, allowed: readonly OutputFormat[]): OutputFormat {
  const format = allowed.find((candidate) => candidate === value.toLowerCase());
  if (!format) throw new Error(`Unsupported format "${value}" (expected ${allowed.join(", ")})`);
  return format;
}

// =============================================================================
// Tables
// =============================================================================

/** Box-drawn table for terminal output. */
export function table(headers: string[], rows: string[][]): string {
  const widths = headers.map((h, i) => Math.max(h.length, ...rows.map((r) => (r[i] ?? "").length)));

  const sep = widths.map((w) => "─".repeat(w + 2)).join("┼");
  const formatRow = (cells: string[]) => widths.map((w, i) => ` ${(cells[i] ?? "").padEnd(w)} `).join("│");

  return [formatRow(headers), sep, ...rows.map(formatRow)].join("\n");
}

export function markdownTable(headers: string[], rows: string[][]): string {
  const escape = (cell: string) => cell.replace(/\|/g, "\\|");
  return [
    "| " + headers.map(escape).join(" | ") + " |",
    "| " + headers.map(() => "---").join(" | ") + " |",
    ...rows.map((row) => "| " + headers.map((_, i) => escape(row[i] ?? "")).join(" | ") + " |"),
  ].join("\n");
}

export type Column<T> = [header: string, cell: (row: T) => string];

/**
 * Render records as JSON or as a table over the given columns.
 */
export function renderRecords<T>(records: readonly T[], columns: readonly Column<T>[], format: OutputFormat): string {
  if (format === "json") return JSON.stringify(records, null, 2);

  const headers = columns.map(([header]) => header);
  const rows = records.map((record) => columns.map(([, cell]) => cell(record)));
  return format === "markdown" ? markdownTable(headers, rows) : table(headers, rows);
}

// =============================================================================
// Reports
// =============================================================================

export function formatConnectivityText(report: ConnectivityReport): string {
  if (!report.reachable) {
    return `No connectivity path found from ${report.source} to ${report.destination}.`;
  }
  return [
    `Connectivity confirmed from ${report.source} to ${report.destination}. Path:`,
    ...report.path.map((hop) => `Hop ${hop.hop}: ${hop.node} | IPs: ${hop.ips.join(", ")}`),
  ].join("\n");
}

export function formatPeeringReport(report: PeeringReport, format: OutputFormat): string {
  if (format === "json") return JSON.stringify(report, null, 2);

  const headers = ["VNet 1", "VNet 2", "1 → 2", "2 → 1", "Status"];
  const rows = report.pairs.map((pair) => [
    `${pair.vnet1Name} (${pair.vnet1ResourceGroup})`,
    `${pair.vnet2Name} (${pair.vnet2ResourceGroup})`,
    pair.vnet1ToVnet2State,
    pair.vnet2ToVnet1State,
    pair.connected ? "Connected" : "Partial/Disconnected",
  ]);
  const { total, connectedCount, connectivityPercentage } = report.summary;
  const summary = `${connectedCount} of ${total} peering(s) connected (${connectivityPercentage}%)`;

  if (format === "markdown") {
    return ["## VNet Peering Report", "", markdownTable(headers, rows), "", `**${summary}**`].join("\n");
  }
  return [table(headers, rows), "", summary].join("\n");
}
