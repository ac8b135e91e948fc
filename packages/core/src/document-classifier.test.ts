import { describe, it, expect } from "vitest";
import { classify, scoreCategories } from "./document-classifier.js";

function chunks(...contents: string[]): { content: string }[] {
  return contents.map((content) => ({ content }));
}

describe("classify", () => {
  it("detects research papers", () => {
    expect(classify(chunks("Abstract. We test the hypothesis with a new methodology."))).toBe(
      "research",
    );
  });

  it("detects business reports", () => {
    expect(classify(chunks("Quarterly revenue beat every KPI this quarter."))).toBe("business");
  });

  it("detects legal documents", () => {
    expect(classify(chunks("Whereas the parties agree to indemnify each other against liability."))).toBe(
      "legal",
    );
  });

  it("detects technical manuals", () => {
    expect(classify(chunks("See the installation manual for configuration steps."))).toBe(
      "technical",
    );
  });

  it("falls back to general without keyword hits", () => {
    expect(classify(chunks("The cat sat on the mat."))).toBe("general");
    expect(classify([])).toBe("general");
  });

  it("matches whole words only", () => {
    expect(scoreCategories(chunks("Abstraction and manually configured revenues."))).toEqual({
      research: 0,
      business: 0,
      legal: 0,
      technical: 0,
    });
  });

  it("is case-insensitive", () => {
    expect(scoreCategories(chunks("REVENUE and Revenue"))).toMatchObject({ business: 4 });
  });

  it("breaks ties by priority research > legal > business > technical", () => {
    // research 2 vs legal 2
    expect(classify(chunks("abstract liability"))).toBe("research");
    // legal 1 vs business 1
    expect(classify(chunks("contract profit"))).toBe("legal");
    // business 2 vs technical 2
    expect(classify(chunks("revenue installation"))).toBe("business");
  });

  it("only scans the leading chunks", () => {
    const doc = chunks("nothing here", "still nothing", "whereas liability indemnify");
    expect(classify(doc, { prefixChunks: 2 })).toBe("general");
    expect(classify(doc, { prefixChunks: 3 })).toBe("legal");
  });

  it("sums weights per category", () => {
    expect(scoreCategories(chunks("abstract study", "methodology findings"))).toEqual({
      research: 6,
      business: 0,
      legal: 0,
      technical: 0,
    });
  });
});
