// __tests__/print.test.ts
import { describe, it, expect, vi } from "vitest";
import { customError, Frame, print, sprint } from "..";

describe("print", () => {
  const err = customError(new Error("boom"), [
    new Frame({ func: "main.f", path: "a.go", line: 10 }),
    new Frame({ func: "main.main", path: "b.go", line: 3 }),
  ]);

  it("should list one line per frame after the message", () => {
    expect(sprint(err)).toBe("boom\na.go:10 main.f()\nb.go:3 main.main()");
  });

  it("should print the message alone for untraced values", () => {
    expect(sprint(new Error("plain"))).toBe("plain");
    expect(sprint("text")).toBe("text");
  });

  it("should print nothing for a missing error", () => {
    expect(sprint(null)).toBe("");
    expect(sprint(undefined)).toBe("");
  });

  it("should write to the console's error stream", () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});

    print(err);

    expect(errorSpy).toHaveBeenCalledWith(
      "boom\na.go:10 main.f()\nb.go:3 main.main()"
    );
  });
});
