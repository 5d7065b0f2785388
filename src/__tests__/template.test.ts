import { describe, it, expect } from "vitest";
import { formatTemplate } from "../template.js";

const fields = {
  "5h_pct": "45",
  "7d_pct": "12",
  "5h_reset": "2h10m",
  "7d_reset": "Not started",
  status: "",
  icon_plain: "*",
};

describe("formatTemplate", () => {
  it("substitutes plain placeholders", () => {
    expect(formatTemplate("{icon_plain} {5h_pct}%", fields)).toBe("* 45%");
  });

  it("leaves unknown placeholders as written", () => {
    expect(formatTemplate("{5h_pct} {nope}", fields)).toBe("45 {nope}");
  });

  it("keeps a conditional span when the field has a value", () => {
    expect(formatTemplate("{5h_pct}%{?5h_reset} in {5h_reset}{/5h_reset}", fields)).toBe(
      "45% in 2h10m"
    );
  });

  it("drops a conditional span for 'Not started'", () => {
    expect(formatTemplate("{7d_pct}%{?7d_reset} in {7d_reset}{/7d_reset}", fields)).toBe(
      "12%"
    );
  });

  it("drops a conditional span for empty and missing fields", () => {
    expect(formatTemplate("a{?status}[{status}]{/status}b", fields)).toBe("ab");
    expect(formatTemplate("a{?missing}x{/missing}b", fields)).toBe("ab");
  });

  it("requires every field in a multi-field conditional", () => {
    expect(formatTemplate("{?5h_reset&7d_reset}both{/}", fields)).toBe("");
    expect(formatTemplate("{?5h_reset&5h_pct}{5h_reset}/{5h_pct}{/}", fields)).toBe(
      "2h10m/45"
    );
  });

  it("handles several conditional spans in one template", () => {
    expect(
      formatTemplate(
        "{?5h_reset}5h:{5h_reset}{/5h_reset} {?7d_reset}7d:{7d_reset}{/7d_reset}",
        fields
      )
    ).toBe("5h:2h10m ");
  });
});
