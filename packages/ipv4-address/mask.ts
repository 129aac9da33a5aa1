import { and, countBits, not, toNumber } from "uint8array-utils";
import type { AddressConstructor, BaseAddress } from "./base";
import { InvalidInputError } from "./errors";

/**
 * Creates a prefix mask with `maskLength` leading ones.
 * @throws InvalidInputError when `maskLength` is not an integer within `[0, addressLength]`
 */
export function createMaskBuffer(addressLength: number, maskLength: number): Uint8Array {
    if (!Number.isInteger(maskLength) || maskLength < 0 || maskLength > addressLength) {
        throw new InvalidInputError(`prefix length ${maskLength} is out of range 0-${addressLength}`);
    }

    let buffer = new Uint8Array(addressLength / 8);

    let i = 0;
    while (maskLength > 0) {
        if (maskLength >= 8) {
            maskLength -= 8;
            buffer[i] = 0xff;
        } else {
            buffer[i] = 0xff << (8 - maskLength);
            maskLength = 0;
        }

        i++;
    }

    return buffer;
};

/**
 * negative return value means the ones are not contiguous, i.e. the buffer is no prefix mask
 * @returns length
 */
export function calculateMaskBufferLength(buffer: Uint8Array): number {
    let length = countBits(buffer);
    let expected = createMaskBuffer(buffer.length * 8, length);

    for (let i = 0; i < buffer.length; i++) {
        if (buffer[i] != expected[i]) return -1;
    }

    return length;
}

export type AddressMaskInput<A extends BaseAddress> = number | Uint8Array | A | string;

export class AddressMask<A extends BaseAddress> {
    private address: AddressConstructor<A>;
    readonly buffer: Uint8Array;

    constructor(address: AddressConstructor<A>, input: AddressMaskInput<A>) {
        this.address = address;

        if (typeof input == "number") {
            this.buffer = createMaskBuffer(address.ADDRESS_LENGTH, input);
        } else if (input instanceof Uint8Array) {
            this.buffer = new Uint8Array(input);
        } else if (typeof input == "string") {
            this.buffer = this.address.parse(input);
        } else {
            this.buffer = new Uint8Array(input.buffer);
        }
    }

    /**
     * checks whether the mask is a contiguous prefix mask of the right size. Relevant when it was built from user input.
     */
    isValid(): boolean {
        if (this.buffer.length != (this.address.ADDRESS_LENGTH / 8)) {
            return false;
        }

        return this.length >= 0;
    }

    /** true when both addresses are in the same network */
    compare(address1: A, address2: A): boolean {
        return toNumber(and(this.buffer, address1.buffer)) == toNumber(and(this.buffer, address2.buffer));
    }

    /** clears the host bits */
    mask(address: A): A {
        return new this.address(and(this.buffer, address.buffer));
    }

    get length(): number {
        return calculateMaskBufferLength(this.buffer);
    }

    /** the complement of the mask, e.g. 0.0.0.255 for /24 */
    get wildcard(): A {
        return new this.address(not(this.buffer));
    }

    toAddress(): A {
        return new this.address(this.buffer);
    }

    toString(): string {
        return this.toAddress().toString();
    }
}

/**
 * @throws InvalidInputError if `validate` is set and the mask is not a valid prefix mask
 */
export function createMask<A extends BaseAddress>(address: AddressConstructor<A>, input: AddressMaskInput<A>, validate = true): AddressMask<A> {
    let mask = new AddressMask<A>(address, input);

    if (validate && !mask.isValid()) {
        throw new InvalidInputError(`${mask} is not a valid subnet mask`);
    }

    return mask;
}
