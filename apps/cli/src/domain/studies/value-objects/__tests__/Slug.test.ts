import { describe, it, expect } from "@jest/globals";
import { baseSlug, sanitizeCitation, slugCandidate } from "../Slug";

describe("Slug", () => {
  describe("sanitizeCitation", () => {
    it.each([
      ["John 3:16-21", "john-3-16-21"],
      ["1 Corinthians 13:1-13", "1-corinthians-13-1-13"],
      ["Psalm 5 | Isaiah 40:1", "psalm-5-isaiah-40-1"],
      ["Genesis 6:1–7:10", "genesis-6-17-10"],
      ["!!!", "passage"],
    ])("should turn %s into %s", (citation, expected) => {
      expect(sanitizeCitation(citation)).toBe(expected);
    });

    it("should cap long citations without a trailing dash", () => {
      const slug = sanitizeCitation("Psalm 119:1-176 | Lamentations 3:1-66 | Revelation 21:1-27 | John 1");

      expect(slug.length).toBeLessThanOrEqual(60);
      expect(slug.endsWith("-")).toBe(false);
      expect(slug.startsWith("psalm-119-1-176-lamentations-3-1-66")).toBe(true);
    });
  });

  it("should combine protocol, citation and local date", () => {
    expect(baseSlug("threshold", "John 3:16-21", new Date(2026, 9, 19, 23, 30))).toBe(
      "threshold_john-3-16-21_20261019",
    );
  });

  it("should suffix later candidates", () => {
    expect(slugCandidate("threshold_john-3-16-21_20261019", 1)).toBe("threshold_john-3-16-21_20261019");
    expect(slugCandidate("threshold_john-3-16-21_20261019", 2)).toBe("threshold_john-3-16-21_20261019-2");
  });
});
