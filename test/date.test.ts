// test/date.test.ts
import { describe, it, expect } from "vitest";
import {
  daysInMonth,
  formatExifDateTime,
  formatIsoDate,
  formatSetFileDate,
  inferDateFromFilename,
  toCalendarDate,
  toLocalDate,
} from "../src/utils/date";

describe("inferDateFromFilename", () => {
  describe("full dates", () => {
    it("reads YYYY.MM.DD", () => {
      expect(inferDateFromFilename("2023.07.04_bbq.png")).toEqual({
        precision: "day",
        year: 2023,
        month: 7,
        day: 4,
      });
    });

    it("reads YYYY-M-D without padding", () => {
      expect(inferDateFromFilename("2023-7-4.jpg")).toEqual({ precision: "day", year: 2023, month: 7, day: 4 });
    });

    it("accepts mixed separators", () => {
      expect(inferDateFromFilename("trip_2023-07.04.png")).toEqual({
        precision: "day",
        year: 2023,
        month: 7,
        day: 4,
      });
    });

    it("uses the leftmost date", () => {
      expect(inferDateFromFilename("2019-01-01_and_2020-02-02.jpg")).toEqual({
        precision: "day",
        year: 2019,
        month: 1,
        day: 1,
      });
    });

    it("takes at most two digits for the day", () => {
      expect(inferDateFromFilename("2023-07-045.jpg")).toEqual({ precision: "day", year: 2023, month: 7, day: 4 });
    });

    it("ignores directories in the path", () => {
      expect(inferDateFromFilename("albums/1999/2020-05-06.png")).toEqual({
        precision: "day",
        year: 2020,
        month: 5,
        day: 6,
      });
    });

    it("accepts Feb 29 in leap years only", () => {
      expect(inferDateFromFilename("2024-02-29.jpg")).toEqual({ precision: "day", year: 2024, month: 2, day: 29 });
      expect(inferDateFromFilename("2023-02-29.jpg")).toBeNull();
      expect(inferDateFromFilename("1900-02-29.jpg")).toBeNull();
    });

    it("infers every valid day for sample years in both separator styles", () => {
      for (const year of [1900, 1970, 2000, 2023, 2100]) {
        for (let month = 1; month <= 12; month++) {
          for (let day = 1; day <= daysInMonth(year, month); day++) {
            const expected = { precision: "day", year, month, day };
            expect(inferDateFromFilename(`x_${year}-${month}-${day}_y.png`)).toEqual(expected);
            expect(inferDateFromFilename(`x_${year}.${month}.${day}_y.png`)).toEqual(expected);
          }
        }
      }
    });
  });

  describe("invalid full dates do not fall back", () => {
    it.each([
      "2023-02-30-party.jpg",
      "2023-04-31.png",
      "2023-13-01.jpg",
      "2023-00-10.jpg",
      "2023-01-00.jpg",
      "2023-01-32.jpg",
      "1899-12-31.jpg",
      "2101-01-01.jpg",
    ])("%s infers no date", (filename) => {
      expect(inferDateFromFilename(filename)).toBeNull();
    });
  });

  describe("year and month", () => {
    it("reads YYYY-MM with day 1", () => {
      const date = inferDateFromFilename("2023-12_album.jpg");
      expect(date).toEqual({ precision: "month", year: 2023, month: 12 });
      expect(date && toCalendarDate(date)).toEqual({ year: 2023, month: 12, day: 1 });
    });

    it("reads YYYY.M", () => {
      expect(inferDateFromFilename("2023.5 trip.png")).toEqual({ precision: "month", year: 2023, month: 5 });
    });

    it("matches when the next separator is not followed by a digit", () => {
      expect(inferDateFromFilename("2023-07-x.png")).toEqual({ precision: "month", year: 2023, month: 7 });
    });

    it("treats the last dot as the extension", () => {
      expect(inferDateFromFilename("2023.07.04")).toEqual({ precision: "month", year: 2023, month: 7 });
    });

    it("does not fall back to the year for an invalid month", () => {
      expect(inferDateFromFilename("2023-13_x.jpg")).toBeNull();
    });
  });

  describe("year only", () => {
    it("reads a bare year as January 1", () => {
      const date = inferDateFromFilename("IMG_2022.jpg");
      expect(date).toEqual({ precision: "year", year: 2022 });
      expect(date && toCalendarDate(date)).toEqual({ year: 2022, month: 1, day: 1 });
    });

    it("reads the first four digits of a longer run", () => {
      expect(inferDateFromFilename("20230704_120000.jpg")).toEqual({ precision: "year", year: 2023 });
    });

    it.each(["IMG_1899.jpg", "IMG_2101.jpg", "scan_0001_2022.jpg"])("%s infers no date", (filename) => {
      expect(inferDateFromFilename(filename)).toBeNull();
    });
  });

  it("returns null when there are no digits", () => {
    expect(inferDateFromFilename("photo.png")).toBeNull();
  });

  it("is deterministic", () => {
    expect(inferDateFromFilename("2023.07.04_bbq.png")).toEqual(inferDateFromFilename("2023.07.04_bbq.png"));
  });
});

describe("date formatting", () => {
  it("formats EXIF date times at midnight", () => {
    expect(formatExifDateTime({ precision: "day", year: 2023, month: 7, day: 4 })).toBe("2023:07:04 00:00:00");
    expect(formatExifDateTime({ precision: "month", year: 2023, month: 7 })).toBe("2023:07:01 00:00:00");
    expect(formatExifDateTime({ precision: "year", year: 1999 })).toBe("1999:01:01 00:00:00");
  });

  it("formats ISO dates", () => {
    expect(formatIsoDate({ precision: "day", year: 2023, month: 12, day: 25 })).toBe("2023-12-25");
  });

  it("builds local midnight", () => {
    expect(toLocalDate({ precision: "year", year: 2022 }).getTime()).toBe(new Date(2022, 0, 1).getTime());
    expect(toLocalDate({ precision: "day", year: 2023, month: 7, day: 4 }).getTime()).toBe(
      new Date(2023, 6, 4, 0, 0, 0).getTime()
    );
  });

  it("formats SetFile dates as MM/DD/YYYY HH:MM:SS", () => {
    expect(formatSetFileDate(new Date(2023, 6, 4))).toBe("07/04/2023 00:00:00");
  });

  it("counts days in month", () => {
    expect(daysInMonth(2024, 2)).toBe(29);
    expect(daysInMonth(2023, 2)).toBe(28);
    expect(daysInMonth(2000, 2)).toBe(29);
    expect(daysInMonth(2023, 12)).toBe(31);
  });
});
