import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { bold, dim, green, red, yellow } from "../../src/format/colors.js";

let savedForceColor: string | undefined;
let savedNoColor: string | undefined;

beforeEach(() => {
  savedForceColor = process.env.FORCE_COLOR;
  savedNoColor = process.env.NO_COLOR;
  process.env.FORCE_COLOR = "1";
  delete process.env.NO_COLOR;
});

afterEach(() => {
  if (savedForceColor !== undefined) {
    process.env.FORCE_COLOR = savedForceColor;
  } else {
    delete process.env.FORCE_COLOR;
  }
  if (savedNoColor !== undefined) {
    process.env.NO_COLOR = savedNoColor;
  } else {
    delete process.env.NO_COLOR;
  }
});

describe("colors", () => {
  it("bold and dim share the intensity reset", () => {
    expect(bold("hello")).toBe("\x1b[1mhello\x1b[22m");
    expect(dim("hello")).toBe("\x1b[2mhello\x1b[22m");
  });

  it("foreground colors reset to the default color", () => {
    expect(red("late")).toBe("\x1b[31mlate\x1b[39m");
    expect(green("done")).toBe("\x1b[32mdone\x1b[39m");
    expect(yellow("doing")).toBe("\x1b[33mdoing\x1b[39m");
  });

  it("styles can be nested", () => {
    expect(bold(red("important"))).toBe("\x1b[1m\x1b[31mimportant\x1b[39m\x1b[22m");
  });

  it("NO_COLOR disables output even when forced", () => {
    process.env.NO_COLOR = "";
    expect(bold("hello")).toBe("hello");
    expect(red("hello")).toBe("hello");
  });
});
