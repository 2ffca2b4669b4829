import { describe, it, expect } from "vitest";
import { appendMedalSymbol, formatNickname, formatSteps, renderMedalSummary, stripMedalSymbols } from "../formatUtils";
import { rankMedals } from "../rankMedals";
import type { StepRecord } from "../stores";

function makeRecord(nickname: string, steps: number): StepRecord {
  return { userId: null, nickname, date: "2024-05-01", steps };
}

describe("formatSteps", () => {
  it("groups thousands with spaces", () => {
    expect(formatSteps(12000)).toBe("12 000");
    expect(formatSteps(1234567)).toBe("1 234 567");
    expect(formatSteps(950)).toBe("950");
  });
});

describe("formatNickname", () => {
  it("adds a single leading #", () => {
    expect(formatNickname("alice")).toBe("#alice");
    expect(formatNickname("#alice")).toBe("#alice");
  });
});

describe("renderMedalSummary", () => {
  it("puts tied winners on one line per medal", () => {
    const ranked = rankMedals([
      makeRecord("a", 12000),
      makeRecord("b", 12000),
      makeRecord("c", 9000),
      makeRecord("d", 9000),
      makeRecord("e", 8000),
      makeRecord("f", 100),
    ]);
    expect(renderMedalSummary("2024-05-01", ranked)).toBe(
      [
        "Медали за 01.05.2024:",
        "🥇 #a, #b — 12 000 шагов",
        "🥈 #c, #d — 9 000 шагов",
        "🥉 #e — 8 000 шагов",
      ].join("\n")
    );
  });

  it("omits medals nobody reached", () => {
    const ranked = rankMedals([makeRecord("solo", 500)]);
    expect(renderMedalSummary("2024-12-31", ranked)).toBe("Медали за 31.12.2024:\n🥇 #solo — 500 шагов");
  });
});

describe("appendMedalSymbol", () => {
  it("appends the symbol after the cell text", () => {
    expect(appendMedalSymbol("8500", "🥇")).toBe("8500 🥇");
  });

  it("is idempotent", () => {
    const once = appendMedalSymbol("8500", "🥈");
    expect(appendMedalSymbol(once, "🥈")).toBe(once);
  });

  it("replaces a different medal instead of stacking", () => {
    expect(appendMedalSymbol("8500 🥇", "🥉")).toBe("8500 🥉");
  });

  it("removes duplicated symbols left by earlier runs", () => {
    expect(appendMedalSymbol("8500 🥇🥇 🥈", "🥇")).toBe("8500 🥇");
  });

  it("returns only the symbol for an empty cell", () => {
    expect(appendMedalSymbol("", "🥇")).toBe("🥇");
  });
});

describe("stripMedalSymbols", () => {
  it("removes every medal symbol and the trailing space", () => {
    expect(stripMedalSymbols("1000 🥉")).toBe("1000");
    expect(stripMedalSymbols("1000 🥇 🥈")).toBe("1000");
    expect(stripMedalSymbols("1000")).toBe("1000");
  });
});
