import { describe, it, expect } from "vitest";
import {
  extractReportMetadata,
  extractReportedDate,
  extractSampleDate,
  formatLongDate,
  monthsBetween,
  parseDateLiteral,
} from "./report-metadata";

describe("parseDateLiteral", () => {
  it("reads ISO dates", () => {
    expect(parseDateLiteral("2024-01-15")).toBe("2024-01-15");
  });

  it("reads numeric dates month first with two digit years", () => {
    expect(parseDateLiteral("1/2/24")).toBe("2024-01-02");
  });

  it("falls back to day first when the month is out of range", () => {
    expect(parseDateLiteral("13/02/2023")).toBe("2023-02-13");
  });

  it("reads month names", () => {
    expect(parseDateLiteral("Sept. 9, 2023")).toBe("2023-09-09");
  });

  it("rejects impossible dates", () => {
    expect(parseDateLiteral("2024-02-30")).toBeNull();
    expect(parseDateLiteral("someday")).toBeNull();
  });
});

describe("extractSampleDate", () => {
  it("finds a labelled sample date", () => {
    expect(extractSampleDate("Sample Date: 2024-01-15")).toBe("2024-01-15");
  });

  it("prefers a labelled date over an earlier bare date", () => {
    expect(extractSampleDate("Printed 2024-03-01. Collected on 03/05/2023")).toBe(
      "2023-03-05"
    );
  });

  it("falls back to the first date in the text", () => {
    expect(extractSampleDate("Report generated January 5, 2024 for you")).toBe(
      "2024-01-05"
    );
  });

  it("returns null without a date", () => {
    expect(extractSampleDate("No dates here")).toBeNull();
    expect(extractSampleDate("Sample Date: 2024-02-30")).toBeNull();
  });
});

describe("extractReportedDate", () => {
  it("keeps a full date when the user gives one", () => {
    expect(extractReportedDate("It was January 5, 2024, no antibiotics")).toBe("2024-01-05");
  });

  it("accepts a month name and year", () => {
    expect(extractReportedDate("I took it in March 2024")).toBe("2024-03");
    expect(extractReportedDate("sept. 2023 and no antibiotics")).toBe("2023-09");
  });

  it("accepts a numeric month and year", () => {
    expect(extractReportedDate("around 11/2023")).toBe("2023-11");
  });

  it("rejects out of range months and text without a date", () => {
    expect(extractReportedDate("13/2023")).toBeNull();
    expect(extractReportedDate("No antibiotics, not sure when")).toBeNull();
  });
});

describe("date helpers", () => {
  it("counts calendar months", () => {
    expect(monthsBetween("2024-01-15", new Date("2024-07-01T00:00:00Z"))).toBe(6);
    expect(monthsBetween("2023-11-30", new Date("2024-02-01T00:00:00Z"))).toBe(3);
  });

  it("formats long dates", () => {
    expect(formatLongDate("2024-01-15")).toBe("January 15, 2024");
  });
});

describe("extractReportMetadata", () => {
  it("collects date, lab and diversity", () => {
    const text = "Viome Gut Report\nSample Date: 2024-01-15\nShannon diversity index: 3.42";
    expect(extractReportMetadata(text, new Date("2024-07-20T00:00:00Z"))).toEqual({
      sample_date: "2024-01-15",
      sample_age_months: 6,
      lab_name: "Viome",
      diversity_metrics: { shannon: 3.42 },
    });
  });

  it("returns an empty object when nothing is detected", () => {
    expect(extractReportMetadata("plain text", new Date("2024-07-20T00:00:00Z"))).toEqual({});
  });
});
