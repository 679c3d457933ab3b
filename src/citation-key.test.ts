import { describe, expect, it } from "vitest";
import { extractFamilyName, generateCitationKey } from "./citation-key.js";

describe("Citation Key Generation", () => {
  describe("extractFamilyName", () => {
    it("takes the part before the comma in 'Family, Given' form", () => {
      expect(extractFamilyName("Smith, J.")).toBe("Smith");
    });

    it("takes the last word in 'Given Family' form", () => {
      expect(extractFamilyName("J. Smith")).toBe("Smith");
    });

    it("keeps name particles with the family name", () => {
      expect(extractFamilyName("Johannes van der Waals")).toBe("van der Waals");
    });
  });

  describe("generateCitationKey", () => {
    it("should generate key from author family name and year", () => {
      expect(generateCitationKey("Smith, J.", "2024")).toBe("smith2024");
    });

    it("should generate key from a 'Given Family' author", () => {
      expect(generateCitationKey("Alice B. Jones", "2019")).toBe("jones2019");
    });

    it("should transliterate non-ASCII characters", () => {
      expect(generateCitationKey("Müller, K.", "2023")).toBe("muller2023");
    });

    it("should fallback to unknown for CJK characters", () => {
      expect(generateCitationKey("田中", "2024")).toBe("unknown2024");
    });

    it('should use "unknown" when no author provided', () => {
      expect(generateCitationKey(undefined, "2024")).toBe("unknown2024");
      expect(generateCitationKey("", "2024")).toBe("unknown2024");
    });

    it('should use "0000" when no year provided', () => {
      expect(generateCitationKey("Smith, J.", undefined)).toBe("smith0000");
      expect(generateCitationKey("Smith, J.", "")).toBe("smith0000");
    });

    it("should join multi-word family names", () => {
      expect(generateCitationKey("van der Berg, J.", "2024")).toBe("vanderberg2024");
    });

    it("should strip non-alphanumeric characters after transliteration", () => {
      expect(generateCitationKey("O'Brien, K.", "2024")).toBe("obrien2024");
    });

    it("should handle collision suffixes", () => {
      expect(generateCitationKey("Smith, J.", "2024", ["smith2024"])).toBe("smith2024a");
    });

    it("should accept any iterable of existing keys", () => {
      const existing = new Set(["smith2024", "smith2024a"]);
      expect(generateCitationKey("Smith, J.", "2024", existing)).toBe("smith2024b");
    });

    it("should handle many collisions", () => {
      const existing = [
        "smith2024",
        ...Array.from({ length: 26 }, (_, i) => `smith2024${String.fromCodePoint(97 + i)}`),
      ];
      // After a-z (26 collisions + base), should continue to aa
      expect(generateCitationKey("Smith, J.", "2024", existing)).toBe("smith2024aa");
    });
  });
});
