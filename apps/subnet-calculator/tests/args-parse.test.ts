import { describe, test, expect } from "vitest";
import { args_parse, args_parse_ext } from "../src/utils/args-parse";

describe("args_parse", () => {
    test("whitespace", () => {
        expect(args_parse("calc  10.0.0.1/8\t--page 2")).toStrictEqual(["calc", "10.0.0.1/8", "--page", "2"]);
        expect(args_parse("   ")).toStrictEqual([]);
    })

    test("quotes", () => {
        expect(args_parse(`calc "10.0.0.1 255.0.0.0"`)).toStrictEqual(["calc", "10.0.0.1 255.0.0.0"]);
        expect(args_parse(`list '10.0.0.0/8' 16`)).toStrictEqual(["list", "10.0.0.0/8", "16"]);
        expect(args_parse(`a"b c"d`)).toStrictEqual(["ab cd"]);
    })

    test("escapes inside quotes", () => {
        expect(args_parse(`'a\\'b'`)).toStrictEqual(["a'b"]);
        expect(args_parse(`"a\\\\b"`)).toStrictEqual(["a\\b"]);
        expect(args_parse(`"a\\b"`)).toStrictEqual(["a\\b"]);
    })

    test("active argument", () => {
        expect(args_parse_ext("help ca")).toStrictEqual({ args: ["help", "ca"], active: 1 });
        expect(args_parse_ext("help ca", 4)).toStrictEqual({ args: ["help", "ca"], active: 0 });
        expect(args_parse_ext("help ")).toStrictEqual({ args: ["help"], active: -1 });
    })
})
