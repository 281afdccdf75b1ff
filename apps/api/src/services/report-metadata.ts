const MONTHS = [
  "jan",
  "feb",
  "mar",
  "apr",
  "may",
  "jun",
  "jul",
  "aug",
  "sep",
  "oct",
  "nov",
  "dec",
];

const DATE_SOURCE = [
  "(\\d{4}-\\d{1,2}-\\d{1,2}",
  "|\\d{1,2}[/.-]\\d{1,2}[/.-]\\d{2,4}",
  "|(?:jan|feb|mar|apr|may|jun|jul|aug|sep|oct|nov|dec)[a-z]*\\.?\\s+\\d{1,2},?\\s+\\d{4})",
].join("");

const DATE_LABEL = [
  "(?:sample\\s*date|collection\\s*date|date\\s*of\\s*collection",
  "|collected(?:\\s*on)?|test\\s*date|date\\s*tested)",
].join("");

const LABELLED_DATE = new RegExp(`${DATE_LABEL}\\s*[:\\-]?\\s*${DATE_SOURCE}`, "i");

const NAMED_MONTH_YEAR = new RegExp(
  "\\b(january|february|march|april|may|june|july|august|september|october|" +
    "november|december|jan|feb|mar|apr|jun|jul|aug|sept|sep|oct|nov|dec)" +
    "\\.?,?\\s+(\\d{4})\\b",
  "i"
);

const NUMERIC_MONTH_YEAR = /\b(\d{1,2})[/.-](\d{4})\b/;

const ANY_DATE = new RegExp(`\\b${DATE_SOURCE}`, "gi");

const LABS = ["Viome", "Thryve", "uBiome", "Gut Intelligence", "Microba"];

export type DiversityMetrics = {
  shannon?: number;
  simpson?: number;
};

export type DetectedMetadata = {
  sample_date?: string;
  sample_age_months?: number;
  lab_name?: string;
  diversity_metrics?: DiversityMetrics;
};

function toIsoDate(year: number, month: number, day: number): string | null {
  if (month < 1 || month > 12 || day < 1 || day > 31) return null;
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) return null;
  return date.toISOString().slice(0, 10);
}

/**
 * Parse one date literal. Numeric dates are read month-first and fall back
 * to day-first when the month is out of range.
 */
export function parseDateLiteral(raw: string): string | null {
  const value = raw.trim().toLowerCase();

  const iso = value.match(/^(\d{4})-(\d{1,2})-(\d{1,2})$/);
  if (iso) {
    return toIsoDate(Number(iso[1]), Number(iso[2]), Number(iso[3]));
  }

  const numeric = value.match(/^(\d{1,2})[/.-](\d{1,2})[/.-](\d{2,4})$/);
  if (numeric) {
    const first = Number(numeric[1]);
    const second = Number(numeric[2]);
    let year = Number(numeric[3]);
    if (numeric[3].length === 2) year += 2000;
    else if (numeric[3].length === 3) return null;
    return toIsoDate(year, first, second) ?? toIsoDate(year, second, first);
  }

  const named = value.match(/^([a-z]+)\.?\s+(\d{1,2}),?\s+(\d{4})$/);
  if (named) {
    const month = MONTHS.indexOf(named[1].slice(0, 3));
    if (month === -1) return null;
    return toIsoDate(Number(named[3]), month + 1, Number(named[2]));
  }

  return null;
}

/**
 * Find the sample collection date in report text. Labelled dates win over
 * the first bare date in the document.
 */
export function extractSampleDate(text: string): string | null {
  const labelled = text.match(LABELLED_DATE);
  if (labelled) {
    const parsed = parseDateLiteral(labelled[1]);
    if (parsed) return parsed;
  }

  for (const match of text.matchAll(ANY_DATE)) {
    const parsed = parseDateLiteral(match[1]);
    if (parsed) return parsed;
  }

  return null;
}

/**
 * Read a date the user typed in reply to the date question. A full date
 * gives "YYYY-MM-DD"; month and year alone give "YYYY-MM".
 */
export function extractReportedDate(text: string): string | null {
  const full = extractSampleDate(text);
  if (full) return full;

  const named = text.match(NAMED_MONTH_YEAR);
  if (named) {
    const month = MONTHS.indexOf(named[1].slice(0, 3).toLowerCase());
    return toIsoMonth(Number(named[2]), month + 1);
  }

  const numeric = text.match(NUMERIC_MONTH_YEAR);
  if (numeric) {
    return toIsoMonth(Number(numeric[2]), Number(numeric[1]));
  }

  return null;
}

function toIsoMonth(year: number, month: number): string | null {
  if (month < 1 || month > 12) return null;
  return `${year}-${String(month).padStart(2, "0")}`;
}

export function monthsBetween(isoDate: string, now: Date): number {
  const [year, month] = isoDate.split("-").map(Number);
  return (now.getUTCFullYear() - year) * 12 + (now.getUTCMonth() + 1 - month);
}

/** "2024-01-15" -> "January 15, 2024" */
export function formatLongDate(isoDate: string): string {
  return new Intl.DateTimeFormat("en-US", {
    month: "long",
    day: "numeric",
    year: "numeric",
    timeZone: "UTC",
  }).format(new Date(`${isoDate}T00:00:00Z`));
}

function extractDiversity(text: string): DiversityMetrics | undefined {
  const metrics: DiversityMetrics = {};
  const shannon = text.match(/shannon[^0-9]{0,40}?(\d+(?:\.\d+)?)/i);
  if (shannon) metrics.shannon = Number(shannon[1]);
  const simpson = text.match(/simpson[^0-9]{0,40}?(\d+(?:\.\d+)?)/i);
  if (simpson) metrics.simpson = Number(simpson[1]);
  return Object.keys(metrics).length > 0 ? metrics : undefined;
}

export function extractReportMetadata(text: string, now: Date): DetectedMetadata {
  const metadata: DetectedMetadata = {};

  const sampleDate = extractSampleDate(text);
  if (sampleDate) {
    metadata.sample_date = sampleDate;
    metadata.sample_age_months = Math.max(0, monthsBetween(sampleDate, now));
  }

  const lowered = text.toLowerCase();
  const lab = LABS.find((name) => lowered.includes(name.toLowerCase()));
  if (lab) metadata.lab_name = lab;

  const diversity = extractDiversity(text);
  if (diversity) metadata.diversity_metrics = diversity;

  return metadata;
}
