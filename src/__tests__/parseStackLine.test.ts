// __tests__/parseStackLine.test.ts
import { describe, it, expect } from "vitest";
import { parseStackLine } from "@/helpers/stack/parseStackLine";

describe("parseStackLine", () => {
  it("should parse a named call", () => {
    const frame = parseStackLine("    at Server.handle (/srv/app/server.js:42:13)");

    expect(frame?.toJSON()).toEqual({
      func: "Server.handle",
      path: "/srv/app/server.js",
      line: 42,
    });
  });

  it("should name calls without a function anonymous", () => {
    const frame = parseStackLine("    at /srv/app/index.js:7:1");

    expect(frame?.toJSON()).toEqual({
      func: "<anonymous>",
      path: "/srv/app/index.js",
      line: 7,
    });
  });

  it("should drop the async marker", () => {
    const frame = parseStackLine("    at async loadConfig (/srv/app/config.js:12:5)");

    expect(frame?.func).toBe("loadConfig");
    expect(frame?.line).toBe(12);
  });

  it("should keep constructor and alias markers in the name", () => {
    expect(parseStackLine("    at new Service (/srv/app/service.js:5:2)")?.func).toBe(
      "new Service"
    );
    expect(
      parseStackLine("    at Server.handle [as handler] (/srv/app/server.js:42:13)")?.func
    ).toBe("Server.handle [as handler]");
  });

  it("should use line 0 for locations without one", () => {
    expect(parseStackLine("    at Array.map (<anonymous>)")?.toJSON()).toEqual({
      func: "Array.map",
      path: "<anonymous>",
      line: 0,
    });
    expect(parseStackLine("    at async Promise.all (index 0)")?.toJSON()).toEqual({
      func: "Promise.all",
      path: "index 0",
      line: 0,
    });
  });

  it("should convert file URLs to paths", () => {
    expect(parseStackLine("    at main (file:///srv/app/main.mjs:3:9)")?.path).toBe(
      "/srv/app/main.mjs"
    );
  });

  it("should keep Windows paths intact", () => {
    const frame = parseStackLine("    at boot (C:\\app\\boot.js:5:2)");

    expect(frame?.path).toBe("C:\\app\\boot.js");
    expect(frame?.line).toBe(5);
  });

  it("should take the last position of an eval location", () => {
    const frame = parseStackLine(
      "    at eval (eval at <anonymous> (/srv/app/run.js:3:9), <anonymous>:1:1)"
    );

    expect(frame?.func).toBe("eval");
    expect(frame?.path).toBe("eval at <anonymous> (/srv/app/run.js:3:9), <anonymous>");
    expect(frame?.line).toBe(1);
  });

  it("should return null for lines that are not frames", () => {
    expect(parseStackLine("Error: boom")).toBeNull();
    expect(parseStackLine("")).toBeNull();
  });
});
