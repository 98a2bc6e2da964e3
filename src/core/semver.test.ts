import { describe, expect, it } from "vitest";

import { FormatError } from "./errors.js";
import { SemanticVersion } from "./semver.js";

describe("SemanticVersion.parse", () => {
  it("accepts bare versions and prefixed tags", () => {
    expect(SemanticVersion.parse("1.2.3").toVersion()).toBe("1.2.3");
    expect(SemanticVersion.parse("version-7.8.10").toVersion()).toBe("7.8.10");
    expect(SemanticVersion.parse("v10.0.42").major).toBe(10);
  });

  it("renders back to the text it was parsed from", () => {
    for (const text of ["0.0.0", "1.20.300", "12.0.7"]) {
      expect(SemanticVersion.parse(text).toVersion()).toBe(text);
    }
  });

  it("rejects text that is not a three-part version", () => {
    expect(() => SemanticVersion.parse("1.2")).toThrow(FormatError);
    expect(() => SemanticVersion.parse("version-1.2.3-rc1")).toThrow(FormatError);
    expect(() => SemanticVersion.parse("release-2-1.2.3")).toThrow(FormatError);
    expect(SemanticVersion.tryParse("not-a-version")).toBeNull();
  });

  it("rejects negative or fractional components", () => {
    expect(() => SemanticVersion.fromComponents(1, -1, 0)).toThrow(FormatError);
    expect(() => SemanticVersion.fromComponents(1, 1.5, 0)).toThrow(FormatError);
  });
});

describe("SemanticVersion.next", () => {
  const base = SemanticVersion.parse("1.2.3");

  it("increments the requested component and resets lower ones", () => {
    expect(base.next(SemanticVersion.PATCH_INDEX).toVersion()).toBe("1.2.4");
    expect(base.next(SemanticVersion.MINOR_INDEX).toVersion()).toBe("1.3.0");
    expect(base.next(SemanticVersion.MAJOR_INDEX).toVersion()).toBe("2.0.0");
  });

  it("leaves the receiver untouched", () => {
    base.next(SemanticVersion.MAJOR_INDEX);
    expect(base.toVersion()).toBe("1.2.3");
  });
});

describe("SemanticVersion ordering", () => {
  it("sorts by major, then minor, then patch", () => {
    const sorted = ["1.10.0", "1.2.10", "0.9.9", "1.2.9", "2.0.0"]
      .map((text) => SemanticVersion.parse(text))
      .sort(SemanticVersion.compare)
      .map((version) => version.toVersion());

    expect(sorted).toEqual(["0.9.9", "1.2.9", "1.2.10", "1.10.0", "2.0.0"]);
  });

  it("renders tags with the given prefix", () => {
    expect(SemanticVersion.parse("3.4.5").toTag("version")).toBe("version-3.4.5");
    expect(SemanticVersion.parse("3.4.5").equals(SemanticVersion.parse("v3.4.5"))).toBe(true);
  });
});
