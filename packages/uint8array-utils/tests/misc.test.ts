import { describe, expect, test } from "vitest";
import { alloc, countBits, from, fromNumber, toNumber } from "../misc";

describe("uint8array misc", () => {
    test("alloc", () => {
        expect(Array.from(alloc(3))).toStrictEqual([0, 0, 0]);
        expect(Array.from(alloc(2, 0xff))).toStrictEqual([255, 255]);
    })

    test("from number", () => {
        expect(Array.from(fromNumber(0xc0a80001))).toStrictEqual([192, 168, 0, 1]);
        expect(Array.from(fromNumber(1, 2))).toStrictEqual([0, 1]);
        expect(Array.from(from(258, 4))).toStrictEqual([0, 0, 1, 2]);
        // 2 ** 32 does not fit in four bytes
        expect(() => fromNumber(2 ** 32)).toThrow(RangeError);
        expect(() => fromNumber(-1)).toThrow(RangeError);
        expect(() => fromNumber(1.5)).toThrow(RangeError);
    })

    test("to number", () => {
        expect(toNumber(from([255, 255, 255, 255]))).eq(4294967295);
        expect(toNumber(from([10, 0, 0, 1]))).eq(167772161);
        expect(toNumber(fromNumber(3232235777))).eq(3232235777);
    })

    test("count bits", () => {
        expect(countBits(from([0xff, 0xff, 0xf0, 0]))).eq(20);
        expect(countBits(from([0x0f, 0x01]))).eq(5);
        expect(countBits(alloc(4))).eq(0);
    })
})
