import type { Color } from "@vellum/core";

// Largest deviation from the true position allowed, in millimetres
const PRECISION = 0.01;

/**
 * Format a coordinate for SVG output: round to the nearest hundredth, then
 * drop trailing zeros and a trailing decimal point.
 *
 *   1.23456 → "1.23"
 *   10      → "10"
 *   -0.001  → "0"
 */
export function fmtFloat(value: number): string {
  const text = (Math.round(value / PRECISION) * PRECISION).toFixed(8);
  const trimmed = text.replace(/0+$/, "").replace(/\.$/, "");
  return trimmed === "-0" ? "0" : trimmed;
}

export function fmtColor(color: Color): string {
  return color === null ? "none" : escapeXml(color);
}

/** Escape XML special characters in text content and attribute values */
export function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}
