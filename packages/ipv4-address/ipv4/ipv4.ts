import { fromNumber, stringify, toNumber } from "uint8array-utils";
import { BaseAddress } from "../base";
import { InvalidInputError } from "../errors";

// no signs, no leading zeros
const DECIMAL_OCTET_REGEX = /^(0|[1-9][0-9]{0,2})$/;

export class IPV4Address extends BaseAddress {
    static ADDRESS_LENGTH: number = 32;

    /** @throws InvalidInputError if the input is not a dotted-quad address */
    static parse(input: string): Uint8Array {
        if (input.length == 0) {
            throw new InvalidInputError("address is empty");
        }

        let octets = input.split(".");
        if (octets.length != IPV4Address.ADDRESS_LENGTH / 8) {
            throw new InvalidInputError(`"${input}" is not a dotted-quad address, expected four octets`);
        }

        let buffer = new Uint8Array(IPV4Address.ADDRESS_LENGTH / 8);

        octets.forEach((octet, i) => {
            if (!DECIMAL_OCTET_REGEX.test(octet)) {
                throw new InvalidInputError(`octet "${octet}" of "${input}" is not a decimal number`);
            }

            let n = parseInt(octet, 10);
            if (n > 255) {
                throw new InvalidInputError(`octet ${n} of "${input}" is out of range 0-255`);
            }

            buffer[i] = n;
        });

        return buffer;
    }

    static validate(input: unknown): boolean {
        if (typeof input != "string") return false;

        try {
            IPV4Address.parse(input);
            return true;
        } catch (error) {
            if (error instanceof InvalidInputError) return false;
            throw error;
        }
    }

    static fromNumber(n: number): IPV4Address {
        return new IPV4Address(fromNumber(n, IPV4Address.ADDRESS_LENGTH / 8));
    }

    readonly buffer: Uint8Array;

    constructor(input: string);
    constructor(input: Uint8Array);
    constructor(input: IPV4Address);
    constructor(input: string | Uint8Array | IPV4Address) {
        super();
        if (typeof input == "string") {
            this.buffer = IPV4Address.parse(input);
        } else if (input instanceof IPV4Address) {
            this.buffer = new Uint8Array(input.buffer);
        } else if (input.length * 8 == IPV4Address.ADDRESS_LENGTH) {
            this.buffer = new Uint8Array(input);
        } else {
            throw new Error("failed to initialize: " + IPV4Address.name);
        }
    }

    /** unsigned 32-bit value */
    toNumber(): number {
        return toNumber(this.buffer);
    }

    /** e.g. 11000000.10101000.00000001.00000000 */
    toBinaryString(): string {
        return stringify(this.buffer, "binary");
    }

    /**
     * The reverse lookup name of the address, or of the zone made of its first `octets` octets.
     * @example new IPV4Address("192.168.1.0").toReverseDomain(3) == "1.168.192.in-addr.arpa"
     */
    toReverseDomain(octets: number = this.buffer.length): string {
        return Array.from(this.buffer.subarray(0, octets), String)
            .reverse()
            .concat(["in-addr", "arpa"])
            .join(".");
    }

    toString(): string {
        return `${this.buffer[0]}.${this.buffer[1]}.${this.buffer[2]}.${this.buffer[3]}`;
    }
}
