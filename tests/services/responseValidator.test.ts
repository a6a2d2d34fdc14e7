import { describe, expect, it } from "vitest";
import { validateResponse } from "../../src/services/responseValidator";

const cleanResponse =
  'The service reads the configuration file at startup and caches "settings" in memory so that each request can reuse the parsed values without extra disk access.';

describe("validateResponse", () => {
  it("passes a clean, quoted response of sufficient length", () => {
    const report = validateResponse(cleanResponse);

    expect(report).toEqual({
      status: "passed",
      issues: [],
      confidence: 1,
      issueCount: 0
    });
  });

  it("flags a single absolute claim with 0.85 confidence", () => {
    const report = validateResponse(
      'The cache always evicts the oldest entry when the "maxEntries" limit is reached, so memory use stays bounded for every tenant that shares the process.'
    );

    expect(report.issues).toEqual(["Found absolute claim pattern: absolute_claims"]);
    expect(report.confidence).toBeCloseTo(0.85, 10);
    expect(report.status).toBe("flagged");
    expect(report.issueCount).toBe(1);
  });

  it("also reports a one-sentence absolute claim as too short", () => {
    const report = validateResponse("The cache always evicts the oldest entry.");

    expect(report.issues).toEqual([
      "Found absolute claim pattern: absolute_claims",
      "Response too short (may be incomplete)"
    ]);
    expect(report.confidence).toBeCloseTo(0.65, 10);
    expect(report.status).toBe("flagged");
  });

  it("reports short responses", () => {
    const report = validateResponse("Use a hash map here.");

    expect(report.issues).toEqual(["Response too short (may be incomplete)"]);
    expect(report.confidence).toBeLessThanOrEqual(0.8);
    expect(report.status).toBe("flagged");
  });

  it("matches patterns as whole words only", () => {
    const report = validateResponse(
      'The "alwaysOn" flag keeps the neverland worker warm, and the improvement was measured against the previous release using the staging cluster for two weeks.'
    );

    expect(report.issues).toEqual([]);
    expect(report.status).toBe("passed");
  });

  it("counts each matching pattern of one category separately", () => {
    const report = validateResponse(
      'This approach is "simple" and it always works, it never blocks the event loop, and the rest of the request handling stays exactly the same as before.'
    );

    expect(report.issues).toEqual([
      "Found absolute claim pattern: absolute_claims",
      "Found absolute claim pattern: absolute_claims"
    ]);
    expect(report.confidence).toBeCloseTo(0.7, 10);
  });

  it("reports at most two contradiction clauses", () => {
    const report = validateResponse(
      'The "fast" path is cheap but rarely taken. The slow path is common but expensive to run. The cache helps but only for repeated keys in the same request window.'
    );

    expect(report.issues).toEqual(["Potential contradiction detected", "Potential contradiction detected"]);
    expect(report.confidence).toBeCloseTo(0.8, 10);
    expect(report.status).toBe("flagged");
  });

  it("reports long responses without any quote character", () => {
    const text = [
      "The service reads the configuration file at startup and keeps the parsed settings in memory.",
      "Each request reuses those values without extra disk access.",
      "Operators can reload the file by sending a signal to the process, which swaps the settings atomically."
    ].join(" ");
    expect(text.length).toBeGreaterThan(200);

    const report = validateResponse(text);

    expect(report.issues).toEqual(["No quoted sources found"]);
    expect(report.confidence).toBeCloseTo(0.95, 10);
    expect(report.status).toBe("flagged");
  });

  it("fails responses with more than three issues", () => {
    const report = validateResponse("It always works and never fails, it is impossible to break but that is proven.");

    expect(report.issues).toEqual([
      "Found absolute claim pattern: absolute_claims",
      "Found absolute claim pattern: absolute_claims",
      "Found absolute claim pattern: absolute_claims",
      "Found absolute claim pattern: unqualified_statements",
      "Potential contradiction detected",
      "Response too short (may be incomplete)"
    ]);
    expect(report.status).toBe("failed");
    expect(report.issueCount).toBe(6);
    expect(report.confidence).toBeCloseTo(0.1, 10);
  });

  it("clamps confidence at zero", () => {
    const report = validateResponse(
      "I invented it always. I created it but never. I developed it however impossible. It will definitely and will certainly be proven and undeniable."
    );

    expect(report.issueCount).toBe(12);
    expect(report.issues.filter((issue) => issue === "Potential contradiction detected")).toHaveLength(2);
    expect(report.confidence).toBe(0);
    expect(report.status).toBe("failed");
  });

  it("measures the quote check in characters rather than UTF-16 units", () => {
    const text = Array.from({ length: 25 }, () => "😀😀😀😀😀").join(" ");
    expect(Array.from(text)).toHaveLength(149);
    expect(text.length).toBeGreaterThan(200);

    const report = validateResponse(text);

    expect(report.issues).toEqual([]);
    expect(report.status).toBe("passed");
  });

  it("treats non-ASCII letters as part of a word", () => {
    const report = validateResponse(
      'El "modo" ñalways mantiene el worker caliente, y la mejora se midió contra la versión anterior usando el clúster de pruebas durante dos semanas.'
    );

    expect(report.issues).toEqual([]);
  });

  it("does not split contradiction words on accented letters", () => {
    const report = validateResponse(
      'The "retry" helper keeps the queue small and the worker handles each job in order, éhowever the runner logs every attempt for later review by operators.'
    );

    expect(report.issues).toEqual([]);
  });

  it("coerces non-text input to its string form", () => {
    const report = validateResponse(12345);

    expect(report.issues).toEqual(["Response too short (may be incomplete)"]);
    expect(report.status).toBe("flagged");
  });
});
