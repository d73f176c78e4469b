export const RULE = "=".repeat(80);

export function truncateHash(hash: string, length = 16): string {
  if (hash.length <= length) {
    return hash;
  }
  return `${hash.slice(0, length)}...`;
}

export function renderAsciiBox(content: readonly string[]): string {
  const width = Math.max(...content.map((line) => line.length));
  const border = `+${"-".repeat(width + 2)}+`;
  const body = content.map((line) => `| ${line.padEnd(width)} |`);
  return [border, ...body, border].join("\n");
}

export function renderAsciiTable(
  rows: readonly (readonly string[])[],
  headers: readonly string[],
): string {
  const widths = headers.map((header, index) =>
    Math.max(header.length, ...rows.map((row) => row[index]?.length ?? 0)),
  );
  const border = `+${widths.map((w) => "-".repeat(w + 2)).join("+")}+`;
  const renderRow = (row: readonly string[]): string =>
    `| ${row.map((cell, index) => cell.padEnd(widths[index] ?? 0)).join(" | ")} |`;
  return [border, renderRow(headers), border, ...rows.map(renderRow), border].join(
    "\n",
  );
}

export function formatPercent(value: number): string {
  return `${value.toFixed(1)}%`;
}
