import { describe, expect, it } from "vitest";

import { cheapestContiguousWindow, DayPrices, deriveHourlyRows, parseDayAheadPayload } from "@dayahead/domain";
import { buildDayPrices, buildPayload, quarterStart, quartersFromHourly } from "../support/payloads";

const DATE = "2025-01-15";

describe("DayPrices", () => {
  it("reads status, delivery date and metadata for the area", () => {
    const data = buildDayPrices({deliveryDate: DATE, prices: {NL: [10, 20]}, state: "Final"});

    expect(data.deliveryDate).toBe(DATE);
    expect(data.currency).toBe("EUR");
    expect(data.status).toBe("Final");
    expect(data.isFinal).toBe(true);
    expect(data.isPreliminary).toBe(false);
    expect(data.updatedAt).toBe("2025-01-15T11:45:00Z");
    expect(data.version).toBe(2);
    expect(data.areaAvailable).toBe(true);
  });

  it("falls back to Preliminary when the area has no state entry", () => {
    const payload = buildPayload({deliveryDate: DATE, prices: {NL: [10], SE3: [5]}});
    const data = new DayPrices({...payload, areaStates: [{state: "Final", areas: ["NL"]}]}, "SE3");

    expect(data.status).toBe("Preliminary");
    expect(data.isPreliminary).toBe(true);
  });

  it("reports an area missing from every entry as unavailable", () => {
    const data = new DayPrices(buildPayload({deliveryDate: DATE, prices: {NL: [10, 20]}}), "DK1");

    expect(data.areaAvailable).toBe(false);
    expect(data.quarterRows.map((row) => row.value)).toEqual([null, null]);
  });

  it("applies defaults for a sparse payload", () => {
    const data = new DayPrices(parseDayAheadPayload({}), "NL");

    expect(data.deliveryDate).toBe("");
    expect(data.currency).toBe("EUR");
    expect(data.quarterRows).toEqual([]);
    expect(data.hourRows).toEqual([]);
    expect(data.stats("quarter")).toEqual({min: null, max: null, average: null, count: 0});
  });

  it("derives hourly rows spanning four quarters", () => {
    const data = buildDayPrices({deliveryDate: DATE, prices: {NL: [10, 20, 30, 40, 50, 50, 50, 50]}});

    expect(data.hourRows).toEqual([
      {startTime: quarterStart(DATE, 0), endTime: quarterStart(DATE, 4), value: 25},
      {startTime: quarterStart(DATE, 4), endTime: quarterStart(DATE, 8), value: 50},
    ]);
    expect(data.rows("hour")).toBe(data.hourRows);
    expect(data.rows("quarter")).toBe(data.quarterRows);
  });

  it("computes statistics over priced rows only", () => {
    const data = buildDayPrices({deliveryDate: DATE, prices: {NL: [10.123456, null, -5, 30]}});

    expect(data.stats("quarter")).toEqual({min: -5, max: 30, average: 11.70782, count: 3});
  });

  it("finds the price of the slot containing an instant", () => {
    const data = buildDayPrices({deliveryDate: DATE, prices: {NL: [10, 20, 30, 40]}});

    expect(data.priceAt(new Date(quarterStart(DATE, 0)), "quarter")).toBe(10);
    expect(data.priceAt(new Date(Date.parse(quarterStart(DATE, 1)) + 60_000), "quarter")).toBe(20);
    expect(data.priceAt(new Date(quarterStart(DATE, 3)), "hour")).toBe(25);
    expect(data.priceAt(new Date(quarterStart(DATE, 4)), "quarter")).toBeNull();
  });

  describe("cheapestBlocks", () => {
    const data = buildDayPrices({deliveryDate: DATE, prices: {NL: [10, 90, 15, 80, 20, 20, 50, 50]}});

    it("returns the contiguous run with the lowest mean", () => {
      const blocks = data.cheapestBlocks(2, "quarter", true);

      expect(blocks.map((row) => row.startTime)).toEqual([quarterStart(DATE, 4), quarterStart(DATE, 5)]);
    });

    it("returns the individually cheapest rows in time order", () => {
      const blocks = data.cheapestBlocks(2, "quarter", false);

      expect(blocks.map((row) => row.value)).toEqual([10, 15]);
      expect(blocks.map((row) => row.startTime)).toEqual([quarterStart(DATE, 0), quarterStart(DATE, 2)]);
    });

    it("returns nothing when more rows are requested than priced", () => {
      expect(data.cheapestBlocks(9, "quarter", true)).toEqual([]);
      expect(data.cheapestBlocks(0, "quarter", false)).toEqual([]);
    });

    it("works on hourly rows", () => {
      const hourly = buildDayPrices({
        deliveryDate: DATE,
        prices: {NL: quartersFromHourly([80, 70, 60, 50, 45, 40, 55, 90])},
      });

      const blocks = hourly.cheapestBlocks(3, "hour", true);

      expect(blocks.map((row) => row.value)).toEqual([50, 45, 40]);
      expect(blocks[0]?.startTime).toBe(quarterStart(DATE, 12));
    });
  });
});

describe("deriveHourlyRows", () => {
  it("averages the priced quarters of a partial hour", () => {
    const rows = deriveHourlyRows([
      {startTime: "a", endTime: "b", value: 10},
      {startTime: "b", endTime: "c", value: null},
      {startTime: "c", endTime: "d", value: 30},
      {startTime: "d", endTime: "e", value: null},
      {startTime: "e", endTime: "f", value: null},
    ]);

    expect(rows).toEqual([
      {startTime: "a", endTime: "e", value: 20},
      {startTime: "e", endTime: "f", value: null},
    ]);
  });
});

describe("cheapestContiguousWindow", () => {
  it("keeps the earliest window on ties", () => {
    const rows = [{id: 0, price: 5}, {id: 1, price: 5}, {id: 2, price: 5}];

    expect(cheapestContiguousWindow(rows, 2, (row) => row.price)?.map((row) => row.id)).toEqual([0, 1]);
  });

  it("skips windows that contain an unpriced row", () => {
    const rows = [{id: 0, price: 1}, {id: 1, price: null}, {id: 2, price: 4}, {id: 3, price: 6}];

    expect(cheapestContiguousWindow(rows, 2, (row) => row.price)?.map((row) => row.id)).toEqual([2, 3]);
  });

  it("returns null when no window fits", () => {
    expect(cheapestContiguousWindow([{price: 1}], 2, (row) => row.price)).toBeNull();
  });
});
