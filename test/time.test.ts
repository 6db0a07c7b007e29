import test from "node:test";
import assert from "node:assert/strict";
import { formatForDisplay, isValidTimeZone, parseTimestamp } from "../src/util/time.js";

test("parseTimestamp normalizes ISO variants to canonical UTC", () => {
  assert.equal(parseTimestamp("2024-01-15T09:30:00Z"), "2024-01-15T09:30:00.000Z");
  assert.equal(parseTimestamp("2024-01-15 09:30:00"), "2024-01-15T09:30:00.000Z");
  assert.equal(parseTimestamp("2024-01-15T09:30"), "2024-01-15T09:30:00.000Z");
  assert.equal(parseTimestamp("2024-01-15T09:30:00.123456"), "2024-01-15T09:30:00.123Z");
  assert.equal(parseTimestamp("2024-01-15T12:30:00+03:00"), "2024-01-15T09:30:00.000Z");
  assert.equal(parseTimestamp("2024-01-15T04:30:00-0500"), "2024-01-15T09:30:00.000Z");
  assert.equal(parseTimestamp("2024-01-15"), "2024-01-15T00:00:00.000Z");
});

test("parseTimestamp reads numbers and digit strings as epoch seconds", () => {
  assert.equal(parseTimestamp(1_705_311_000), "2024-01-15T09:30:00.000Z");
  assert.equal(parseTimestamp("1705311000"), "2024-01-15T09:30:00.000Z");
  assert.equal(parseTimestamp(0), "1970-01-01T00:00:00.000Z");
});

test("parseTimestamp accepts Date values", () => {
  assert.equal(
    parseTimestamp(new Date(Date.UTC(2024, 0, 15, 9, 30))),
    "2024-01-15T09:30:00.000Z"
  );
});

test("parseTimestamp rejects unsupported encodings and impossible dates", () => {
  assert.throws(() => parseTimestamp("yesterday"), /Unsupported timestamp: yesterday/);
  assert.throws(() => parseTimestamp("2024-02-30T10:00:00Z"), RangeError);
  assert.throws(() => parseTimestamp("2024-01-15T25:00:00Z"), RangeError);
  assert.throws(() => parseTimestamp(new Date(Number.NaN)), RangeError);
});

test("parseTimestamp rejects years that do not fit four digits", () => {
  assert.throws(() => parseTimestamp(999_999_999_999), /Unsupported timestamp: 999999999999/);
  assert.throws(() => parseTimestamp("999999999999"), RangeError);
  assert.throws(() => parseTimestamp(new Date(Date.UTC(10_000, 0, 1))), RangeError);
  assert.throws(() => parseTimestamp("9999-12-31T23:30:00-01:00"), RangeError);
  assert.equal(parseTimestamp(253_402_300_799), "9999-12-31T23:59:59.000Z");
});

test("timestamps from different encodings order correctly once normalized", () => {
  const values = [
    parseTimestamp("2024-01-15T12:00:00+03:00"),
    parseTimestamp("2024-01-15 08:59:59"),
    parseTimestamp(1_705_309_200)
  ];
  assert.deepEqual([...values].sort(), [
    "2024-01-15T08:59:59.000Z",
    "2024-01-15T09:00:00.000Z",
    "2024-01-15T09:00:00.000Z"
  ]);
});

test("formatForDisplay renders in the configured time zone", () => {
  assert.equal(formatForDisplay("2024-01-15T09:30:00.000Z", "UTC"), "2024-01-15 09:30:00 UTC");
  assert.ok(
    formatForDisplay("2024-01-15T09:30:00.000Z", "Europe/Moscow").startsWith("2024-01-15 12:30:00 ")
  );
});

test("isValidTimeZone distinguishes IANA names from garbage", () => {
  assert.equal(isValidTimeZone("Europe/Moscow"), true);
  assert.equal(isValidTimeZone("Mars/Olympus"), false);
});
