import { ParseError } from "../../tokenizer";
import { EvaluateOptions, evaluate, evaluateLine, parseCommandLine } from "../index";

const options: EvaluateOptions = {
    precision: 10,
    parseErrorMessage: "Unable to parse expression",
    steps: false,
    tree: false,
};

describe("evaluate", () => {
    test("tokenizes then reduces", () => {
        expect(evaluate("2 + 3 * 4")).toBe(14);
        expect(evaluate("1 / 0")).toBe(Infinity);
    });

    test("is deterministic", () => {
        expect(evaluate("0.1 + 0.2 / 3 ^ 2")).toBe(evaluate("0.1 + 0.2 / 3 ^ 2"));
    });

    test("surfaces parse errors", () => {
        expect(() => evaluate("2 +")).toThrow(ParseError);
    });
});

describe("evaluateLine", () => {
    test("prints the formatted result", () => {
        expect(evaluateLine("6.0 / 1", options)).toEqual(["6"]);
        expect(evaluateLine("1 / 0", options)).toEqual(["Infinity"]);
        expect(evaluateLine("-3.5", options)).toEqual(["-3.5"]);
        expect(evaluateLine("1 / 3000000000000", options)).toEqual([String(1 / 3000000000000)]);
    });

    test("replaces a parse error with the fixed message", () => {
        expect(evaluateLine("2 . . 3", options)).toEqual(["Unable to parse expression"]);
        expect(evaluateLine("", { ...options, parseErrorMessage: "?" })).toEqual(["?"]);
    });

    test("steps", () => {
        expect(evaluateLine("2 + 3 * 4", { ...options, steps: true })).toEqual(["= 2 + 12", "14"]);
        expect(evaluateLine("7", { ...options, steps: true })).toEqual(["7"]);
    });

    test("tree", () => {
        expect(evaluateLine("2 + 3 * 4", { ...options, tree: true })).toEqual(["2 + (3 * 4)", "14"]);
    });

    test("tree and steps together", () => {
        expect(evaluateLine("2 ^ 3 ^ 2", { ...options, tree: true, steps: true }))
            .toEqual(["(2 ^ 3) ^ 2", "= 8 ^ 2", "64"]);
    });
});

describe("parseCommandLine", () => {
    test("joins positional arguments", () => {
        expect(parseCommandLine(["2", "+", "3"])).toEqual({
            steps: false,
            tree: false,
            help: false,
            expression: "2 + 3",
        });
    });

    test("negative numbers are not flags", () => {
        expect(parseCommandLine(["--steps", "-3", "*", "2", "--tree"])).toEqual({
            steps: true,
            tree: true,
            help: false,
            expression: "-3 * 2",
        });
    });

    test("help", () => {
        expect(parseCommandLine(["-h"]).help).toBe(true);
        expect(parseCommandLine(["--help"]).expression).toBe("");
    });
});
