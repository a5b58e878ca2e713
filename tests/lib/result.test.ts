import { describe, it, expect } from "vitest";

import {
  ok,
  err,
  unwrap,
  unwrapOr,
  map,
  mapErr,
  andThen,
  all,
  tryCatch,
  tryCatchAsync,
} from "@/lib/result.js";

import type { Result } from "@/lib/result.js";

describe("Result", () => {
  it("ok wraps data", () => {
    const result = ok("Hello, World!");
    expect(result).toEqual({ success: true, data: "Hello, World!" });
  });

  it("err wraps an error", () => {
    const error = new Error("missing name");
    expect(err(error)).toEqual({ success: false, error });
  });

  describe("unwrap", () => {
    it("returns data for a successful result", () => {
      expect(unwrap(ok("rendered"))).toBe("rendered");
    });

    it("throws the error of a failed result", () => {
      expect(() => unwrap(err(new Error("missing name")))).toThrow("missing name");
    });

    it("wraps a non-Error failure before throwing", () => {
      expect(() => unwrap(err("bad template"))).toThrow("bad template");
    });
  });

  describe("unwrapOr", () => {
    it("returns data for a successful result", () => {
      expect(unwrapOr(ok("rendered"), "fallback")).toBe("rendered");
    });

    it("returns the default for a failed result", () => {
      const result: Result<string, Error> = err(new Error("missing name"));
      expect(unwrapOr(result, "fallback")).toBe("fallback");
    });
  });

  describe("map", () => {
    it("transforms a successful result", () => {
      expect(unwrap(map(ok("prompt"), (text) => text.toUpperCase()))).toBe("PROMPT");
    });

    it("passes a failed result through", () => {
      const error = new Error("missing name");
      const result: Result<string, Error> = err(error);
      expect(map(result, (text) => text.length)).toEqual({ success: false, error });
    });
  });

  describe("mapErr", () => {
    it("transforms the error of a failed result", () => {
      const result: Result<number, string> = err("bad spec");
      const mapped = mapErr(result, (message) => new Error(message));
      expect(mapped.success).toBe(false);
      if (!mapped.success) {
        expect(mapped.error.message).toBe("bad spec");
      }
    });

    it("passes a successful result through", () => {
      expect(unwrap(mapErr(ok(3), (e: string) => new Error(e)))).toBe(3);
    });
  });

  describe("andThen", () => {
    it("chains successful results", () => {
      expect(unwrap(andThen(ok(21), (x) => ok(x * 2)))).toBe(42);
    });

    it("short-circuits on error", () => {
      const result: Result<number, Error> = err(new Error("first"));
      let called = false;
      const chained = andThen(result, (x) => {
        called = true;
        return ok(x * 2);
      });
      expect(chained.success).toBe(false);
      expect(called).toBe(false);
    });
  });

  describe("all", () => {
    it("combines successful results in order", () => {
      expect(unwrap(all([ok("a"), ok("b"), ok("c")]))).toEqual(["a", "b", "c"]);
    });

    it("returns the first error", () => {
      const first = new Error("first");
      const results: Result<string, Error>[] = [ok("a"), err(first), err(new Error("second"))];
      expect(all(results)).toEqual({ success: false, error: first });
    });
  });

  describe("tryCatch", () => {
    it("wraps a returned value", () => {
      expect(unwrap(tryCatch(() => JSON.parse('{"name":"Ada"}')))).toEqual({ name: "Ada" });
    });

    it("captures a thrown error", () => {
      const result = tryCatch(() => JSON.parse("{"));
      expect(result.success).toBe(false);
    });

    it("wraps non-Error throws", () => {
      const result = tryCatch(() => {
        throw "string error";
      });
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(Error);
        expect(result.error.message).toBe("string error");
      }
    });
  });

  describe("tryCatchAsync", () => {
    it("wraps a resolved value", async () => {
      expect(unwrap(await tryCatchAsync(async () => "done"))).toBe("done");
    });

    it("captures a rejection", async () => {
      const result = await tryCatchAsync(async () => {
        throw new Error("async error");
      });
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.message).toBe("async error");
      }
    });
  });
});
