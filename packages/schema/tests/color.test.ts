import { describe, it, expect } from "vitest";
import {
  parseHexColor,
  toHexColor,
  shadeColor,
  lightenColor,
} from "../src/color.js";

describe("color helpers", () => {
  it("parses #rrggbb into channels", () => {
    expect(parseHexColor("#8b4513")).toEqual({ r: 139, g: 69, b: 19 });
  });

  it("parses malformed input as black", () => {
    expect(parseHexColor("tan")).toEqual({ r: 0, g: 0, b: 0 });
  });

  it("formats and clamps channels", () => {
    expect(toHexColor({ r: 300, g: -4, b: 15.6 })).toBe("#ff0010");
  });

  it("shades every channel by the depth factor", () => {
    // 200 * 0.88 = 176 (0xb0), 100 * 0.88 = 88 (0x58), 50 * 0.88 = 44 (0x2c)
    expect(shadeColor("#c86432", 0.88)).toBe("#b0582c");
  });

  it("lightens per channel with clamping", () => {
    expect(lightenColor("#daa520", 35, 25, 10)).toBe("#fdbe2a");
    expect(lightenColor("#f0f0f0", 35, 25, 10)).toBe("#fffffa");
  });
});
