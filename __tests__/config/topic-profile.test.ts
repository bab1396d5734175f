/**
 * Tests for topic profile loading
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { describe, it, expect } from "vitest";
import { loadTopicProfile, parseTopicProfile } from "../../src/config/topic-profile";
import { ConfigError } from "../../src/lib/errors";

const validProfile = {
  subject: "Fisheries",
  description: "fishing rights in UK waters",
  considerations: ["Quotas and licences"],
  primaryTerms: [" Fishing Quota ", "fisheries"],
  secondaryTerms: ["trawler"],
};

describe("loadTopicProfile", () => {
  it("should load the bundled Brexit profile", () => {
    const profile = loadTopicProfile();

    expect(profile.subject).toBe("Brexit");
    expect(profile.primaryTerms).toContain("article 50");
    expect(profile.secondaryTerms).toContain("single market");
  });

  it("should load a profile from a file", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "profile-"));
    const file = path.join(dir, "fisheries.json");
    fs.writeFileSync(file, JSON.stringify(validProfile));

    try {
      expect(loadTopicProfile(file).subject).toBe("Fisheries");
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it("should fail on a missing file", () => {
    expect(() => loadTopicProfile(path.join(os.tmpdir(), "no-such-profile.json"))).toThrow(
      /^Cannot read topic profile at /
    );
  });
});

describe("parseTopicProfile", () => {
  it("should normalize terms", () => {
    const profile = parseTopicProfile(validProfile, "test");

    expect(profile.primaryTerms).toEqual(["fishing quota", "fisheries"]);
  });

  it("should reject terms listed twice", () => {
    expect(() => parseTopicProfile({ ...validProfile, secondaryTerms: ["Fisheries"] }, "test")).toThrow(
      "secondaryTerms: Terms listed as both primary and secondary: fisheries"
    );
  });

  it("should reject an empty term list", () => {
    expect(() => parseTopicProfile({ ...validProfile, primaryTerms: [] }, "test")).toThrow(ConfigError);
  });
});
