import { afterEach, describe, expect, it, vi } from "vitest";
import { notFound, forbidden, invalidArgument, invalidState } from "../errors";
import { AutoBody, BadRequest, MarkBody, parse, sendError } from "../http";

function fakeRes() {
  const sent: { status?: number; body?: unknown } = {};
  const res = {
    status(code: number) {
      sent.status = code;
      return {
        json(body: unknown) {
          sent.body = body;
          return body;
        },
      };
    },
  };
  return { res, sent };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("unit: http error mapping", () => {
  it.each([
    [notFound("Game not found"), 404, "Game not found"],
    [forbidden("Only host can draw"), 403, "Only host can draw"],
    [invalidArgument("bad index"), 422, "bad index"],
    [invalidState("All numbers drawn"), 400, "All numbers drawn"],
  ])("maps %s", (err, status, detail) => {
    const { res, sent } = fakeRes();
    sendError(res, err);
    expect(sent).toEqual({ status, body: { detail } });
  });

  it("answers 500 for unexpected errors", () => {
    const log = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const { res, sent } = fakeRes();
    sendError(res, new Error("boom"));
    expect(sent).toEqual({ status: 500, body: { detail: "Internal error" } });
    expect(log).toHaveBeenCalledTimes(1);
  });

  it("answers 422 with the validation issues", () => {
    const { res, sent } = fakeRes();
    try {
      parse(MarkBody, { user_id: "p1", index: 25, marked: true });
    } catch (e) {
      sendError(res, e);
    }
    expect(sent.status).toBe(422);
  });
});

describe("unit: request bodies", () => {
  it("accepts a cell index from 0 to 24", () => {
    expect(parse(MarkBody, { user_id: "p1", index: 24, marked: false })).toEqual({
      user_id: "p1",
      index: 24,
      marked: false,
    });
    expect(() => parse(MarkBody, { user_id: "p1", index: -1, marked: true })).toThrow(BadRequest);
    expect(() => parse(MarkBody, { user_id: "p1", index: 1.5, marked: true })).toThrow(BadRequest);
  });

  it("defaults the auto-draw interval to five seconds", () => {
    expect(parse(AutoBody, { user_id: "h", on: true })).toEqual({ user_id: "h", on: true, interval: 5 });
  });

  it("rejects auto-draw intervals outside two to sixty", () => {
    expect(() => parse(AutoBody, { user_id: "h", on: true, interval: 1 })).toThrow(BadRequest);
    expect(() => parse(AutoBody, { user_id: "h", on: true, interval: 61 })).toThrow(BadRequest);
  });

  it("rejects an empty user id", () => {
    expect(() => parse(AutoBody, { user_id: "  ", on: false })).toThrow(BadRequest);
  });
});
