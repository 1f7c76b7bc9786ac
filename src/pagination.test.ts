import { describe, it, expect } from "vitest";
import { capOutput, grepLines, paginate } from "./pagination";

describe("paginate", () => {
  it("returns the requested chunk", () => {
    expect(paginate("abcdefghij", 4, 2)).toEqual({ page: 2, totalPages: 3, totalChars: 10, content: "efgh" });
    expect(paginate("abcdefghij", 4, 3).content).toBe("ij");
  });

  it("clamps out-of-range pages", () => {
    expect(paginate("abcdefghij", 4, 9).page).toBe(3);
    expect(paginate("abcdefghij", 4, 0).page).toBe(1);
  });

  it("treats empty text as a single empty page", () => {
    expect(paginate("", 8000)).toEqual({ page: 1, totalPages: 1, totalChars: 0, content: "" });
  });
});

describe("capOutput", () => {
  it("leaves short text alone", () => {
    expect(capOutput("short", 10)).toEqual({ text: "short", truncated: false });
  });

  it("cuts long text and says so", () => {
    const out = capOutput("x".repeat(100), 60);
    expect(out.truncated).toBe(true);
    expect(out.text.length).toBe(60);
    expect(out.text.endsWith("\n[... truncated at 60 of 100 characters]")).toBe(true);
  });
});

describe("grepLines", () => {
  const text = ["alpha", "beta deadline", "gamma", "delta", "epsilon", "DEADLINE again"].join("\n");

  it("keeps matching lines case-insensitively", () => {
    expect(grepLines(text, "deadline")).toEqual({ text: "beta deadline\nDEADLINE again", matches: 2 });
  });

  it("adds context and separates groups", () => {
    expect(grepLines(text, "deadline", 1).text).toBe(
      ["alpha", "beta deadline", "gamma", "--", "epsilon", "DEADLINE again"].join("\n"),
    );
  });

  it("treats an invalid regex literally", () => {
    expect(grepLines("a (b\nc", "(b").text).toBe("a (b");
  });
});
