import { readFile } from "node:fs/promises";
import { z } from "zod";
import type { CorpusRecord, RecordLoadResult } from "@lexrag/types";
import { ValidationError, errorMessage } from "@lexrag/errors";

export interface RecordFilterOptions {
  /** Records whose trimmed content is shorter than this are dropped. */
  minContentLength: number;
}

const recordSchema = z.object({
  id: z.union([z.string(), z.number()]).optional(),
  content: z.string(),
  metadata: z.record(z.unknown()).optional(),
});

function parseJson(text: string, where: string): unknown {
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new ValidationError(`Malformed JSON ${where}: ${errorMessage(err)}`, {}, { cause: err });
  }
}

/**
 * Parse a corpus given either as one JSON array or as newline-delimited JSON
 * objects. A leading `[` selects the array form.
 */
export function parseRecords(text: string, options: RecordFilterOptions, source = "input"): RecordLoadResult {
  const trimmed = text.trimStart();
  let entries: unknown[];

  if (trimmed.startsWith("[")) {
    const parsed = parseJson(trimmed, `in ${source}`);
    if (!Array.isArray(parsed)) {
      throw new ValidationError(`Expected a JSON array of records in ${source}`);
    }
    entries = parsed;
  } else {
    entries = [];
    text.split(/\r?\n/).forEach((line, i) => {
      if (line.trim()) {
        entries.push(parseJson(line, `on line ${String(i + 1)} of ${source}`));
      }
    });
  }

  const records: CorpusRecord[] = [];
  for (const entry of entries) {
    const parsed = recordSchema.safeParse(entry);
    if (parsed.success && parsed.data.content.trim().length >= options.minContentLength) {
      records.push(parsed.data);
    }
  }

  return { records, total: entries.length, dropped: entries.length - records.length };
}

export async function loadRecords(path: string, options: RecordFilterOptions): Promise<RecordLoadResult> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (err) {
    throw new ValidationError(`Cannot read corpus file ${path}: ${errorMessage(err)}`, {}, { cause: err });
  }
  return parseRecords(text, options, path);
}
