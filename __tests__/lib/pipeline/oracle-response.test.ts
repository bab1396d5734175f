/**
 * Tests for parsing oracle replies
 */

import { describe, it, expect } from "vitest";
import { extractFirstJsonObject, parseOracleResponse } from "../../../src/lib/pipeline/oracle-response";

describe("extractFirstJsonObject", () => {
  it("should find an object inside a markdown fence", () => {
    const text = '```json\n{"has_relation": true, "confidence": 0.9}\n```';

    expect(extractFirstJsonObject(text)).toEqual({ has_relation: true, confidence: 0.9 });
  });

  it("should skip braces that are not JSON", () => {
    expect(extractFirstJsonObject('Use {this} format: {"confidence": 0.4}')).toEqual({ confidence: 0.4 });
  });

  it("should keep braces inside strings", () => {
    expect(extractFirstJsonObject('{"reasoning": "quotes a {brace}"}')).toEqual({ reasoning: "quotes a {brace}" });
  });

  it("should return null without an object", () => {
    expect(extractFirstJsonObject("No JSON here")).toBeNull();
    expect(extractFirstJsonObject('{"has_relation": true,')).toBeNull();
  });
});

describe("parseOracleResponse", () => {
  it("should parse a bare reply", () => {
    const reply = '{"has_relation": true, "confidence": 0.8, "reasoning": "Debate on Article 50."}';

    expect(parseOracleResponse(reply)).toEqual({
      hasRelation: true,
      confidence: 0.8,
      reasoning: "Debate on Article 50.",
    });
  });

  it("should parse a reply wrapped in prose", () => {
    const reply = 'Here is my answer:\n{"has_relation": false, "confidence": 0.1, "reasoning": "About fisheries."}\nThanks';

    expect(parseOracleResponse(reply)).toEqual({
      hasRelation: false,
      confidence: 0.1,
      reasoning: "About fisheries.",
    });
  });

  it("should accept the camelCase field name", () => {
    expect(parseOracleResponse('{"hasRelation": true, "confidence": 0.7}')?.hasRelation).toBe(true);
  });

  it("should clamp confidence into [0, 1]", () => {
    expect(parseOracleResponse('{"confidence": 1.7}')?.confidence).toBe(1);
    expect(parseOracleResponse('{"confidence": -0.2}')?.confidence).toBe(0);
  });

  it("should accept a numeric string confidence", () => {
    expect(parseOracleResponse('{"confidence": "0.65"}')?.confidence).toBe(0.65);
  });

  it("should default missing or mistyped fields", () => {
    expect(parseOracleResponse('{"has_relation": "yes", "confidence": "high", "reasoning": 42}')).toEqual({
      hasRelation: false,
      confidence: 0,
      reasoning: "",
    });
  });

  it("should return null when the reply has no JSON object", () => {
    expect(parseOracleResponse("I cannot determine this.")).toBeNull();
    expect(parseOracleResponse("")).toBeNull();
  });
});
