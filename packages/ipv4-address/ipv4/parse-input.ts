import { not } from "uint8array-utils";
import { InvalidInputError } from "../errors";
import { type AddressMask, createMask } from "../mask";
import { IPV4Address } from "./ipv4";

/**
 * - cidr: `192.168.1.10/24`
 * - mask: `192.168.1.10 255.255.255.0`
 * - wildcard: `192.168.1.10 0.0.0.255`
 * - address: `192.168.1.10`, taken as a /32
 *
 * A prefix length may also follow the address after whitespace, `192.168.1.10 24` is a cidr.
 */
export type IPV4InputKind = "cidr" | "mask" | "wildcard" | "address";

export type ParsedIPV4Input = {
    kind: IPV4InputKind;
    address: IPV4Address;
    mask: AddressMask<IPV4Address>;
};

const PREFIX_LENGTH_REGEX = /^[0-9]{1,2}$/;

/**
 * A dotted mask is first read as a subnet mask, failing that as a wildcard.
 * The wildcard has to complement to a contiguous mask as well.
 */
function resolveMaskToken(token: string): Pick<ParsedIPV4Input, "mask"> & { kind: "mask" | "wildcard" } {
    let buffer = IPV4Address.parse(token);

    let mask = createMask(IPV4Address, buffer, false);
    if (mask.isValid()) {
        return { kind: "mask", mask };
    }

    let complement = createMask(IPV4Address, not(buffer), false);
    if (complement.isValid()) {
        return { kind: "wildcard", mask: complement };
    }

    throw new InvalidInputError(`${token} is neither a subnet mask nor a wildcard mask`);
}

/**
 * Reads an address/mask expression, the forms are tried in the order listed on {@link IPV4InputKind}.
 * @throws InvalidInputError
 */
export function parseIPV4Input(input: string): ParsedIPV4Input {
    input = input.trim();
    if (input.length == 0) {
        throw new InvalidInputError("input is empty");
    }

    if (input.includes("/")) {
        let parts = input.split("/");
        if (parts.length != 2) {
            throw new InvalidInputError(`"${input}" contains more than one "/"`);
        }

        let [addressPart, maskPart] = parts;
        let address = new IPV4Address(addressPart);

        if (PREFIX_LENGTH_REGEX.test(maskPart)) {
            return {
                kind: "cidr",
                address,
                mask: createMask(IPV4Address, parseInt(maskPart, 10)),
            };
        }

        if (maskPart.includes(".")) {
            return { address, ...resolveMaskToken(maskPart) };
        }

        throw new InvalidInputError(`prefix length "${maskPart}" is not a number between 0 and 32`);
    }

    let tokens = input.split(/\s+/);
    switch (tokens.length) {
        case 1: return {
            kind: "address",
            address: new IPV4Address(tokens[0]),
            mask: createMask(IPV4Address, IPV4Address.ADDRESS_LENGTH),
        };
        case 2: {
            let address = new IPV4Address(tokens[0]);

            // `10.0.0.1 24` reads like `10.0.0.1/24`
            if (PREFIX_LENGTH_REGEX.test(tokens[1])) {
                return { kind: "cidr", address, mask: createMask(IPV4Address, parseInt(tokens[1], 10)) };
            }

            return { address, ...resolveMaskToken(tokens[1]) };
        }
        default:
            throw new InvalidInputError(`expected an address and at most one mask, got ${tokens.length} values`);
    }
}
