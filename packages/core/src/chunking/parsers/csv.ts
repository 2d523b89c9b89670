// Row-window chunking for delimited tables; the header row labels every value

import { decodeUtf8, numberOption } from "../options.js";
import type { ChunkOptions, ContentParser, ParsedChunk } from "../types.js";

export function parseCsvRows(text: string, delimiter = ","): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = "";
  let inQuotes = false;

  for (let i = 0; i < text.length; i += 1) {
    const ch = text.charAt(i);

    if (inQuotes) {
      if (ch !== '"') {
        field += ch;
      } else if (text.charAt(i + 1) === '"') {
        field += '"';
        i += 1;
      } else {
        inQuotes = false;
      }
      continue;
    }

    if (ch === '"' && field === "") {
      inQuotes = true;
    } else if (ch === delimiter) {
      row.push(field);
      field = "";
    } else if (ch === "\n" || ch === "\r") {
      if (ch === "\r" && text.charAt(i + 1) === "\n") i += 1;
      row.push(field);
      rows.push(row);
      row = [];
      field = "";
    } else {
      field += ch;
    }
  }

  if (field !== "" || row.length > 0) {
    row.push(field);
    rows.push(row);
  }

  return rows.filter((r) => r.some((cell) => cell.trim() !== ""));
}

function renderRow(header: string[], row: string[]): string {
  return row
    .map((value, i) => {
      const label = header[i]?.trim();
      return label ? `${label}: ${value}` : value;
    })
    .join(", ");
}

async function* parseCsvText(text: string, options: ChunkOptions): AsyncGenerator<ParsedChunk> {
  const delimiterOption = options.delimiter;
  const delimiter =
    typeof delimiterOption === "string" && delimiterOption.length === 1 ? delimiterOption : ",";
  const rowsPerChunk = Math.max(1, Math.floor(numberOption(options, "rows_per_chunk", 10)));

  const [header = [], ...rows] = parseCsvRows(text, delimiter);
  for (let start = 0; start < rows.length; start += rowsPerChunk) {
    const window = rows.slice(start, start + rowsPerChunk);
    yield {
      content: window.map((row) => renderRow(header, row)).join("\n"),
      metadata: { row_start: start + 1, row_end: start + window.length },
    };
  }
}

export const csvParser: ContentParser = {
  extensions: [".csv"],
  defaults: { rows_per_chunk: 10, delimiter: "," },
  parse: (bytes, options) => parseCsvText(decodeUtf8(bytes), options),
  parseText: parseCsvText,
};
