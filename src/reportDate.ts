import { addDays, format, isValid, parse } from "date-fns";

interface DateScore {
  score: number;
  count: number;
  firstIndex: number;
}

const COLLECTION_CONTEXT_PATTERN = /\b(?:collected|collection|sample\s*(?:date|drawn|taken)|specimen\s*date|drawn)\b/i;
const RECEIPT_CONTEXT_PATTERN = /\b(?:received|arrival|arrived)\b/i;
const REPORT_CONTEXT_PATTERN = /\b(?:reported|report\s*date|printed|print\s*date|issued|generated)\b/i;

const ISO_DATE_PATTERN = /\b(\d{4})\s*[-/.]\s*(\d{1,2})\s*[-/.]\s*(\d{1,2})\b/g;
const NUMERIC_DATE_PATTERN = /\b(\d{1,2})\s*[/.-]\s*(\d{1,2})\s*[/.-]\s*(\d{2,4})\b/g;
const DAY_MONTH_NAME_PATTERN =
  /\b(\d{1,2})(?:st|nd|rd|th)?\s+(jan|feb|mar|apr|may|jun|jul|aug|sep|oct|nov|dec)[a-z]*\.?,?\s+(\d{4})\b/gi;
const MONTH_NAME_DAY_PATTERN =
  /\b(jan|feb|mar|apr|may|jun|jul|aug|sep|oct|nov|dec)[a-z]*\.?\s+(\d{1,2})(?:st|nd|rd|th)?,?\s+(\d{4})\b/gi;

const EARLIEST_LAB_DATE = "1990-01-01";

const expandYear = (year: string): string => {
  if (year.length !== 2) {
    return year;
  }
  const short = Number(year);
  return String(short >= 70 ? 1900 + short : 2000 + short);
};

const toIso = (value: string, pattern: string): string | null => {
  const parsed = parse(value, pattern, new Date(2000, 0, 1));
  return isValid(parsed) ? format(parsed, "yyyy-MM-dd") : null;
};

/** Every date written in a chunk of text, as ISO strings, in reading order. */
const collectDates = (chunk: string): string[] => {
  const found: Array<{ index: number; iso: string }> = [];
  const push = (index: number | undefined, iso: string | null) => {
    if (iso) {
      found.push({ index: index ?? 0, iso });
    }
  };

  for (const match of chunk.matchAll(ISO_DATE_PATTERN)) {
    push(match.index, toIso(`${match[1]}-${Number(match[2])}-${Number(match[3])}`, "yyyy-M-d"));
  }
  for (const match of chunk.matchAll(NUMERIC_DATE_PATTERN)) {
    const first = Number(match[1]);
    const second = Number(match[2]);
    const year = expandYear(match[3]);
    // Day first unless the second number cannot be a month.
    const iso =
      second > 12 && first <= 12
        ? toIso(`${second}/${first}/${year}`, "d/M/yyyy")
        : toIso(`${first}/${second}/${year}`, "d/M/yyyy");
    push(match.index, iso);
  }
  for (const match of chunk.matchAll(DAY_MONTH_NAME_PATTERN)) {
    push(match.index, toIso(`${Number(match[1])} ${match[2]} ${match[3]}`, "d MMM yyyy"));
  }
  for (const match of chunk.matchAll(MONTH_NAME_DAY_PATTERN)) {
    push(match.index, toIso(`${Number(match[2])} ${match[1]} ${match[3]}`, "d MMM yyyy"));
  }

  return found.sort((left, right) => left.index - right.index).map((entry) => entry.iso);
};

const contextWeight = (line: string): number => {
  if (COLLECTION_CONTEXT_PATTERN.test(line)) {
    return 8;
  }
  if (RECEIPT_CONTEXT_PATTERN.test(line)) {
    return 4;
  }
  if (REPORT_CONTEXT_PATTERN.test(line)) {
    return -3;
  }
  return 1;
};

/**
 * Picks the collection date of a report. Dates on lines that mention sample
 * collection outweigh receipt dates, which outweigh unlabelled dates; report
 * and print dates count against a candidate. Dates after `referenceDate`
 * (plus one day) or before 1990 are ignored.
 */
export const extractReportDate = (text: string, referenceDate: Date = new Date()): string | null => {
  const latest = format(addDays(referenceDate, 1), "yyyy-MM-dd");
  const scores = new Map<string, DateScore>();
  const lines = text.split(/\r?\n/);

  lines.forEach((line, index) => {
    const weight = contextWeight(line);
    for (const iso of collectDates(line)) {
      if (iso < EARLIEST_LAB_DATE || iso > latest) {
        continue;
      }
      const existing = scores.get(iso);
      if (existing) {
        existing.score += weight;
        existing.count += 1;
        continue;
      }
      scores.set(iso, { score: weight, count: 1, firstIndex: index });
    }
  });

  const winner = Array.from(scores.entries()).sort((left, right) => {
    const a = left[1];
    const b = right[1];
    if (b.score !== a.score) {
      return b.score - a.score;
    }
    if (b.count !== a.count) {
      return b.count - a.count;
    }
    return a.firstIndex - b.firstIndex;
  })[0];

  return winner?.[0] ?? null;
};
