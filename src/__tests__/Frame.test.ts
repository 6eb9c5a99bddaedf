// __tests__/Frame.test.ts
import { describe, it, expect } from "vitest";
import { Frame } from "@/errtrace";

describe("Frame", () => {
  const frame = new Frame({ func: "main.f", path: "a.go", line: 10 });

  it("should describe itself as path, line and function", () => {
    expect(frame.describe()).toBe("a.go:10 main.f()");
  });

  it("should use the description as its string form", () => {
    expect(`${frame}`).toBe("a.go:10 main.f()");
  });

  it("should be frozen", () => {
    expect(Object.isFrozen(frame)).toBe(true);
  });

  it("should serialize to a plain record", () => {
    expect(frame.toJSON()).toEqual({ func: "main.f", path: "a.go", line: 10 });
    expect(JSON.stringify(frame)).toBe(
      '{"func":"main.f","path":"a.go","line":10}'
    );
  });

  describe("from()", () => {
    it("should reuse an existing frame", () => {
      expect(Frame.from(frame)).toBe(frame);
    });

    it("should build a frame from a plain record", () => {
      const built = Frame.from({ func: "run", path: "/app/run.ts", line: 4 });

      expect(built).toBeInstanceOf(Frame);
      expect(built.describe()).toBe("/app/run.ts:4 run()");
    });
  });
});
