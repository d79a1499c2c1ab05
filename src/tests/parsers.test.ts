import { describe, expect, it } from "vitest";
import {
  EmptyResponseError,
  InvalidResponseTypeError,
  MissingHomeworkKeyError,
  UnknownStatusError,
  isRecoverable,
} from "../errors";
import checkResponse from "../parsers/checkResponse";
import parseStatus from "../parsers/parseStatus";

describe("checkResponse", () => {
  it("returns the homeworks and current date of a valid response", () => {
    const homework = { homework_name: "hw_sprint1.zip", status: "approved" };
    expect(
      checkResponse({ homeworks: [homework], current_date: 1700000000 })
    ).toEqual({ homeworks: [homework], current_date: 1700000000 });
  });

  it("accepts an empty homework list", () => {
    expect(checkResponse({ homeworks: [], current_date: 5 }).homeworks).toEqual(
      []
    );
  });

  it.each([[null], ["text"], [42], [[{ homeworks: [] }]]])(
    "rejects %j as not an object",
    (value: unknown) => {
      expect(() => checkResponse(value)).toThrow(InvalidResponseTypeError);
    }
  );

  it("reports a missing homeworks key as a recoverable empty response", () => {
    let caught: unknown;
    try {
      checkResponse({ current_date: 1 });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(EmptyResponseError);
    expect(isRecoverable(caught)).toBe(true);
  });

  it("requires current_date", () => {
    expect(() => checkResponse({ homeworks: [] })).toThrow(
      'Homework API response has no "current_date" key'
    );
  });

  it("rejects homeworks that are not a list", () => {
    expect(() =>
      checkResponse({ homeworks: { homework_name: "x" }, current_date: 1 })
    ).toThrow(InvalidResponseTypeError);
  });

  it("rejects a current_date that is not a number", () => {
    expect(() =>
      checkResponse({ homeworks: [], current_date: "yesterday" })
    ).toThrow('Value under "current_date" is not a unix timestamp');
  });
});

describe("parseStatus", () => {
  it("renders the approved verdict", () => {
    expect(
      parseStatus({ homework_name: "hw_sprint1.zip", status: "approved" })
    ).toBe(
      'Изменился статус проверки работы "hw_sprint1.zip". Работа проверена: ревьюеру всё понравилось. Ура!'
    );
  });

  it("renders the reviewing verdict", () => {
    expect(parseStatus({ homework_name: "hw2", status: "reviewing" })).toBe(
      'Изменился статус проверки работы "hw2". Работа взята на проверку ревьюером.'
    );
  });

  it("renders the rejected verdict", () => {
    expect(parseStatus({ homework_name: "hw3", status: "rejected" })).toBe(
      'Изменился статус проверки работы "hw3". Работа проверена: у ревьюера есть замечания.'
    );
  });

  it("uses a custom verdict table", () => {
    const verdicts = { approved: "ok", reviewing: "wait", rejected: "no" };
    expect(parseStatus({ homework_name: "hw", status: "rejected" }, verdicts)).toBe(
      'Изменился статус проверки работы "hw". no'
    );
  });

  it("requires homework_name", () => {
    expect(() => parseStatus({ status: "approved" })).toThrow(
      new MissingHomeworkKeyError("homework_name")
    );
  });

  it("requires status", () => {
    expect(() => parseStatus({ homework_name: "hw" })).toThrow(
      'Homework entry has no "status" key'
    );
  });

  it("rejects an unknown verdict", () => {
    expect(() => parseStatus({ homework_name: "hw", status: "lost" })).toThrow(
      UnknownStatusError
    );
  });

  it("does not treat inherited keys as verdicts", () => {
    expect(() =>
      parseStatus({ homework_name: "hw", status: "toString" })
    ).toThrow("Unknown or empty homework status: toString");
  });

  it("rejects an empty status", () => {
    expect(() => parseStatus({ homework_name: "hw", status: "" })).toThrow(
      "Unknown or empty homework status: "
    );
  });
});
