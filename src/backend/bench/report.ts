import { ComparisonRow, TestResult } from "./runner";

// Renders the side-by-side comparison table:
// ╔═════╦═════╗
// ║ ... ║ ... ║
// ╚═════╩═════╝

export interface ComparisonLabels {
  baseline: string; // column header, e.g. "Simple RLE"
  candidate: string;
  baselineShort: string; // winner column, e.g. "Simple"
  candidateShort: string;
}

export interface Verdict {
  winner: string;
  advantage: number; // percentage points
}

// ratios closer than this are a draw
const kDrawMargin = 0.1;

const kColumnWidths = [26, 17, 17, 9, 9];

export function pickWinner(baselineRatio: number, candidateRatio: number, labels: ComparisonLabels): Verdict {
  if (baselineRatio > candidateRatio + kDrawMargin) {
    return { winner: labels.baselineShort, advantage: baselineRatio - candidateRatio };
  }
  if (candidateRatio > baselineRatio + kDrawMargin) {
    return { winner: labels.candidateShort, advantage: candidateRatio - baselineRatio };
  }
  return { winner: "Draw", advantage: 0 };
}

function formatSigned(value: number): string {
  const sign = value < 0 ? "-" : "+";
  return `${sign}${Math.abs(value).toFixed(1)}`;
}

export function formatResultCell(result: TestResult): string {
  return `${result.ratio.toFixed(1).padStart(6)}% (${String(result.compressedSize).padStart(4)} B)`;
}

function border(left: string, mid: string, right: string): string {
  return left + kColumnWidths.map((w) => "═".repeat(w + 2)).join(mid) + right;
}

function row(cells: string[]): string {
  return "║" + cells.map((cell, i) => ` ${cell.padEnd(kColumnWidths[i])} `).join("║") + "║";
}

export function renderComparisonRow(entry: ComparisonRow, labels: ComparisonLabels): string {
  const verdict = pickWinner(entry.baseline.ratio, entry.candidate.ratio, labels);
  return row([
    entry.name,
    formatResultCell(entry.baseline),
    formatResultCell(entry.candidate),
    verdict.winner,
    `${formatSigned(verdict.advantage).padStart(6)}%`,
  ]);
}

export function renderComparisonTable(rows: ComparisonRow[], labels: ComparisonLabels): string[] {
  return [
    border("╔", "╦", "╗"),
    row(["Test Case", labels.baseline, labels.candidate, "Winner", "Advantage"]),
    border("╠", "╬", "╣"),
    ...rows.map((entry) => renderComparisonRow(entry, labels)),
    border("╚", "╩", "╝"),
  ];
}
