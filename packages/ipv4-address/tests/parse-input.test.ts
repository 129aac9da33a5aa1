import { describe, test, expect } from "vitest";
import { calculateSubnetIPV4, InvalidInputError, parseIPV4Input } from "../index";

function describeInput(input: string) {
    let { kind, address, mask } = parseIPV4Input(input);
    return [kind, address.toString(), mask.length];
}

describe("IPV4 input parser", () => {
    test("cidr", () => {
        expect(describeInput("192.168.1.10/24")).toStrictEqual(["cidr", "192.168.1.10", 24]);
        expect(describeInput("  10.0.0.1/0 ")).toStrictEqual(["cidr", "10.0.0.1", 0]);
        expect(describeInput("10.0.0.1/32")).toStrictEqual(["cidr", "10.0.0.1", 32]);
    })

    test("address with subnet mask", () => {
        expect(describeInput("192.168.1.10 255.255.255.0")).toStrictEqual(["mask", "192.168.1.10", 24]);
        expect(describeInput("192.168.1.10   255.255.252.0")).toStrictEqual(["mask", "192.168.1.10", 22]);
        // all zeros and all ones are valid subnet masks before they are wildcards
        expect(describeInput("192.168.1.10 0.0.0.0")).toStrictEqual(["mask", "192.168.1.10", 0]);
        expect(describeInput("192.168.1.10 255.255.255.255")).toStrictEqual(["mask", "192.168.1.10", 32]);
    })

    test("address with wildcard mask", () => {
        expect(describeInput("10.0.0.5 0.0.0.255")).toStrictEqual(["wildcard", "10.0.0.5", 24]);
        expect(describeInput("10.0.0.5\t0.0.255.255")).toStrictEqual(["wildcard", "10.0.0.5", 16]);
        expect(parseIPV4Input("10.0.0.5 0.0.0.255").mask.toString()).eq("255.255.255.0");
    })

    test("wildcard form is equivalent to the prefix form", () => {
        let wildcard = parseIPV4Input("10.0.0.5 0.0.0.255"),
            cidr = parseIPV4Input("10.0.0.0/24");

        let a = calculateSubnetIPV4(wildcard.address, wildcard.mask),
            b = calculateSubnetIPV4(cidr.address, cidr.mask);

        expect(a.networkAddress.toString()).eq("10.0.0.0");
        expect(a.networkAddress.toString()).eq(b.networkAddress.toString());
        expect(a.broadcastAddress.toString()).eq(b.broadcastAddress.toString());
        expect(a.prefixLength).eq(b.prefixLength);
    })

    test("mask after the slash", () => {
        expect(describeInput("10.0.0.5/255.255.0.0")).toStrictEqual(["mask", "10.0.0.5", 16]);
        expect(describeInput("10.0.0.5/0.0.0.255")).toStrictEqual(["wildcard", "10.0.0.5", 24]);
    })

    test("prefix length after whitespace", () => {
        expect(describeInput("10.0.0.1 24")).toStrictEqual(["cidr", "10.0.0.1", 24]);
        expect(describeInput("10.0.0.1  0")).toStrictEqual(["cidr", "10.0.0.1", 0]);

        let { address, mask } = parseIPV4Input("10.0.0.1 24");
        expect(calculateSubnetIPV4(address, mask).networkAddress.toString()).eq("10.0.0.0");

        expect(() => parseIPV4Input("10.0.0.1 33")).toThrow("prefix length 33 is out of range 0-32");
    })

    test("bare address is a /32", () => {
        expect(describeInput("10.0.0.5")).toStrictEqual(["address", "10.0.0.5", 32]);
    })

    test("prefix length round trip", () => {
        for (let n = 0; n <= 32; n++) {
            expect(parseIPV4Input(`172.16.5.4/${n}`).mask.length).eq(n);
        }
    })

    test("invalid input", () => {
        let inputs = [
            "",
            "   ",
            "999.1.1.1/24",
            "1.2.3/24",
            "1.2.3.4/33",
            "1.2.3.4/abc",
            "1.2.3.4/",
            "1.2.3.4/24/8",
            "1.2.3.4 /24",
            "a.b.c.d",
            "01.2.3.4",
            "1.2.3.4 255.0.255.0",
            "1.2.3.4 255.255.255",
            "1.2.3.4 255.255.255.0 0.0.0.255",
        ];

        for (let input of inputs) {
            expect(() => parseIPV4Input(input), input).toThrow(InvalidInputError);
        }
    })

    test("error messages", () => {
        expect(() => parseIPV4Input("")).toThrow("input is empty");
        expect(() => parseIPV4Input("999.1.1.1/24")).toThrow('octet 999 of "999.1.1.1" is out of range 0-255');
        expect(() => parseIPV4Input("1.2.3.4/33")).toThrow("prefix length 33 is out of range 0-32");
        expect(() => parseIPV4Input("1.2.3.4 255.0.255.0")).toThrow("255.0.255.0 is neither a subnet mask nor a wildcard mask");
    })
})
