import { describe, expect, it } from "vitest";
import { Err, MazeError, Ok, Result } from "../src";

describe("MazeError", () => {
  it("carries code and details", () => {
    const error = MazeError.invalidDimensions("too small", { width: 6 });
    expect(error.name).toBe("MazeError");
    expect(error.code).toBe("INVALID_DIMENSIONS");
    expect(error.details).toEqual({ width: 6 });
    expect(MazeError.isMazeError(error)).toBe(true);
    expect(MazeError.isMazeError(new Error("x"))).toBe(false);
  });

  it("serializes without undefined details", () => {
    const error = MazeError.invalidParameter("bad rate");
    expect(error.toJSON()).toEqual({
      name: "MazeError",
      code: "INVALID_PARAMETER",
      message: "bad rate",
    });
  });
});

describe("Result", () => {
  it("unwraps ok values", () => {
    expect(Ok<number, string>(6).getOrThrow()).toBe(6);
    expect(Ok<number, string>(6).match((n) => n * 2, () => 0)).toBe(12);
  });

  it("throws the carried error", () => {
    const error = MazeError.invalidParameter("bad rate");
    expect(() => Err<number, MazeError>(error).getOrThrow()).toThrow(error);
    expect(Err<number, string>("nope").match(() => "ok", (e) => e)).toBe("nope");
  });

  it("captures thrown errors", () => {
    const res = Result.fromThrowable(
      () => {
        throw new Error("boom");
      },
      (e) => (e instanceof Error ? e.message : "unknown"),
    );
    expect(res.match(() => "ok", (e) => e)).toBe("boom");
  });

  it("lets onError rethrow unrecognized errors", () => {
    expect(() =>
      Result.fromThrowable(
        () => {
          throw new TypeError("foreign");
        },
        (e) => {
          if (MazeError.isMazeError(e)) return e;
          throw e;
        },
      ),
    ).toThrow(TypeError);
  });
});
