/**
 * Available-cities output formats
 */

import type { CityEntry } from "../types/city";

const width = (s: string) => Array.from(s).length;

const pad = (s: string, w: number, right: boolean) => {
  const fill = " ".repeat(Math.max(0, w - width(s)));
  return right ? fill + s : s + fill;
};

/**
 * Grid table with `City` and `ID` columns, e.g.
 *
 * ```
 * +--------+----+
 * | City   | ID |
 * +========+====+
 * | Abakan | 12 |
 * +--------+----+
 * ```
 *
 * Numeric ID columns are right-aligned.
 */
export function formatCityTable(cities: readonly CityEntry[]): string {
  const headers = ["City", "ID"] as const;
  const rows = cities.map((c) => [c.name, c.id] as const);
  const numericIds =
    rows.length > 0 && rows.every(([, id]) => /^\d+$/.test(id));
  const align = [false, numericIds];

  const widths = headers.map((h, col) =>
    Math.max(width(h), ...rows.map((r) => width(r[col]))),
  );
  const rule = (ch: string) =>
    `+${widths.map((w) => ch.repeat(w + 2)).join("+")}+`;
  const line = (cells: readonly string[]) =>
    `| ${cells.map((c, col) => pad(c, widths[col], align[col])).join(" | ")} |`;

  const out = [rule("-"), line(headers), rule("=")];
  for (const row of rows) {
    out.push(line(row), rule("-"));
  }
  return `${out.join("\n")}\n`;
}

export function formatCityJson(cities: readonly CityEntry[]): string {
  return `${JSON.stringify(cities, null, 2)}\n`;
}

/** `.json` targets get a JSON array, anything else the grid table */
export function cityFormatterFor(
  location: string,
): (cities: CityEntry[]) => string {
  return location.toLowerCase().endsWith(".json")
    ? formatCityJson
    : formatCityTable;
}
