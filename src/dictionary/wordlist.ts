/**
 * wordlist.ts
 *
 * Reading and writing word-list files. Two formats, chosen by extension:
 *
 *   .csv  first column is the word; an optional leading "word" header row
 *   .txt  one word per line
 *
 * Files are decoded as strict UTF-8 first, then UTF-16 when a byte-order mark
 * says so, then Windows-1252. Content that still decodes to NUL characters is
 * treated as binary and rejected.
 */

import fs from "node:fs";
import fsp from "node:fs/promises";
import path from "node:path";
import { SpellError, asSpellError } from "../errors.js";

export type WordListFormat = "csv" | "txt";

const CSV_HEADER = "word";

export function formatFromPath(filePath: string): WordListFormat {
  const ext = path.extname(filePath).toLowerCase();
  if (ext === ".csv") return "csv";
  if (ext === ".txt") return "txt";
  throw new SpellError({
    code: "UNSUPPORTED_FORMAT",
    message: `Unsupported word list format "${ext || "(none)"}": expected .csv or .txt`,
    path: filePath,
  });
}

export function decodeWordList(bytes: Uint8Array, filePath?: string): string {
  let text: string;
  if ((bytes[0] === 0xff && bytes[1] === 0xfe) || (bytes[0] === 0xfe && bytes[1] === 0xff)) {
    text = new TextDecoder(bytes[0] === 0xff ? "utf-16le" : "utf-16be").decode(bytes);
  } else {
    try {
      text = new TextDecoder("utf-8", { fatal: true }).decode(bytes);
    } catch {
      text = new TextDecoder("windows-1252").decode(bytes);
    }
  }

  if (text.includes("\u0000")) {
    throw new SpellError({
      code: "INVALID_ENCODING",
      message: `Word list is not text${filePath ? `: ${filePath}` : ""}`,
      path: filePath,
    });
  }
  return text;
}

/** First field of a CSV row, honouring double-quoted fields. */
function firstCsvField(line: string): string {
  const trimmed = line.trimStart();
  if (!trimmed.startsWith('"')) {
    const comma = trimmed.indexOf(",");
    return comma === -1 ? trimmed : trimmed.slice(0, comma);
  }

  let out = "";
  for (let i = 1; i < trimmed.length; i++) {
    const ch = trimmed[i];
    if (ch === '"') {
      if (trimmed[i + 1] === '"') {
        out += '"';
        i += 1;
        continue;
      }
      break;
    }
    out += ch;
  }
  return out;
}

export function parseWordList(content: string, format: WordListFormat): string[] {
  const lines = content.split(/\r?\n/);
  const words: string[] = [];

  lines.forEach((line, index) => {
    const raw = format === "csv" ? firstCsvField(line) : line;
    const word = raw.trim();
    if (!word) return;
    if (format === "csv" && index === 0 && word.toLowerCase() === CSV_HEADER) return;
    words.push(word);
  });

  return words;
}

function quoteCsv(word: string): string {
  return /[",\r\n]/.test(word) ? `"${word.replace(/"/g, '""')}"` : word;
}

export function serializeWordList(words: Iterable<string>, format: WordListFormat): string {
  const rows = [...words];
  if (format === "csv") {
    return [CSV_HEADER, ...rows.map(quoteCsv)].join("\n") + "\n";
  }
  return rows.length > 0 ? rows.join("\n") + "\n" : "";
}

export function readWordListFile(filePath: string): string[] {
  const format = formatFromPath(filePath);
  let bytes: Buffer;
  try {
    bytes = fs.readFileSync(filePath);
  } catch (error) {
    throw asSpellError(error, { code: "IO", message: `Could not read word list ${filePath}`, path: filePath });
  }
  return parseWordList(decodeWordList(bytes, filePath), format);
}

export async function writeWordListFile(filePath: string, words: Iterable<string>): Promise<void> {
  const format = formatFromPath(filePath);
  try {
    await fsp.mkdir(path.dirname(filePath), { recursive: true });
    await fsp.writeFile(filePath, serializeWordList(words, format), "utf8");
  } catch (error) {
    throw asSpellError(error, { code: "IO", message: `Could not write word list ${filePath}`, path: filePath });
  }
}
