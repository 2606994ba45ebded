import { describe, test } from "node:test";
import assert from "node:assert/strict";

import {
  DEFAULT_CHECK_SETTINGS,
  resolveCheckSettings,
} from "../../../config/checkDefaults";
import {
  extractNumbersAndDates,
  findDates,
  parseLocaleNumber,
  sameMultiset,
} from "../numbers";

const numbers = DEFAULT_CHECK_SETTINGS.numbers;
const dates = DEFAULT_CHECK_SETTINGS.dates;

describe("parseLocaleNumber", () => {
  test("reads both decimal conventions as the same value", () => {
    assert.equal(parseLocaleNumber("1,250.50", numbers)?.canonical, "1250.5");
    assert.equal(parseLocaleNumber("1.250,50", numbers)?.canonical, "1250.5");
    assert.equal(parseLocaleNumber("1.250,50", numbers)?.value, 1250.5);
  });

  test("treats a repeated separator as grouping", () => {
    assert.equal(parseLocaleNumber("1,000,000", numbers)?.canonical, "1000000");
    assert.equal(parseLocaleNumber("1.000.000", numbers)?.canonical, "1000000");
  });

  test("single separator with three trailing digits follows the grouping policy", () => {
    assert.equal(parseLocaleNumber("1,250", numbers)?.canonical, "1250");
    assert.equal(parseLocaleNumber("1.250", numbers)?.canonical, "1250");

    const decimalFirst = resolveCheckSettings({
      numbers: { groupingOnly: "decimal" },
    }).numbers;
    assert.equal(parseLocaleNumber("1,250", decimalFirst)?.canonical, "1.25");
  });

  test("a leading zero integer or long integer part means a decimal mark", () => {
    assert.equal(parseLocaleNumber("0,125", numbers)?.canonical, "0.125");
    assert.equal(parseLocaleNumber("1234,567", numbers)?.canonical, "1234.567");
    assert.equal(parseLocaleNumber("3,5", numbers)?.canonical, "3.5");
  });

  test("drops signs and redundant zeros", () => {
    assert.equal(parseLocaleNumber("-007", numbers)?.canonical, "7");
    assert.equal(parseLocaleNumber("2.50", numbers)?.canonical, "2.5");
    assert.equal(parseLocaleNumber("2.00", numbers)?.canonical, "2");
  });

  test("accepts space and NBSP grouping when allowed", () => {
    assert.equal(parseLocaleNumber("1 250", numbers)?.canonical, "1250");
    assert.equal(parseLocaleNumber("1 250,75", numbers)?.canonical, "1250.75");
    const noSpaces = resolveCheckSettings({
      numbers: { allowSpaceGrouping: false },
    }).numbers;
    assert.equal(parseLocaleNumber("1 250", noSpaces), null);
  });

  test("folds non-ASCII digits", () => {
    assert.equal(parseLocaleNumber("١٢", numbers)?.canonical, "12");
  });

  test("returns null for non-numbers", () => {
    assert.equal(parseLocaleNumber("abc", numbers), null);
    assert.equal(parseLocaleNumber("", numbers), null);
  });
});

describe("findDates", () => {
  test("reads numeric dates day first by default", () => {
    const [match] = findDates("Signed on 12/05/2024 in Lyon.", dates);
    assert.equal(match.iso, "2024-05-12");
    assert.equal(match.raw, "12/05/2024");
  });

  test("swaps day and month when the configured order is impossible", () => {
    const [match] = findDates("on 05/25/2024", dates);
    assert.equal(match.iso, "2024-05-25");
  });

  test("month-first order reads ambiguous dates the other way", () => {
    const [match] = findDates("on 12/05/2024", { order: "MDY" });
    assert.equal(match.iso, "2024-12-05");
  });

  test("recognizes ISO and written dates across languages", () => {
    const found = findDates(
      "2024-03-09, 12 May 2024, 12 de mayo de 2024, May 12, 2024 and 3. März 2023",
      dates,
    ).map((match) => match.iso);
    assert.deepEqual(found, [
      "2024-03-09",
      "2024-05-12",
      "2024-05-12",
      "2024-05-12",
      "2023-03-03",
    ]);
  });

  test("ignores impossible dates", () => {
    assert.deepEqual(findDates("31/02/2024", dates), []);
  });
});

describe("extractNumbersAndDates", () => {
  test("numbers inside a date are not counted", () => {
    const result = extractNumbersAndDates("Meeting on 12/05/2024.", {
      numbers,
      dates,
    });
    assert.deepEqual(result, { numbers: [], dates: ["2024-05-12"] });
  });

  test("keeps numbers outside dates", () => {
    const result = extractNumbersAndDates(
      "On 12 May 2024 we sold 1,250.50 units and 3 boxes.",
      { numbers, dates },
    );
    assert.deepEqual(result, { numbers: ["1250.5", "3"], dates: ["2024-05-12"] });
  });

  test("the price sentence yields the same number on both sides", () => {
    const source = extractNumbersAndDates("The price is 1,250.50 dollars.", {
      numbers,
      dates,
    });
    const target = extractNumbersAndDates("El precio es 1.250,50 dólares.", {
      numbers,
      dates,
    });
    assert.deepEqual(source.numbers, ["1250.5"]);
    assert.deepEqual(target.numbers, ["1250.5"]);
  });
});

describe("sameMultiset", () => {
  test("compares values regardless of order but with counts", () => {
    assert.equal(sameMultiset(["1", "2"], ["2", "1"]), true);
    assert.equal(sameMultiset(["1", "1"], ["1"]), false);
    assert.equal(sameMultiset([], []), true);
  });
});
