export type AddressErrorKind = "InvalidInput" | "InvalidRange";

/** Validation failures raised by the calculator. Messages are meant to be shown to the user as they are. */
export abstract class AddressError extends Error {
    abstract readonly kind: AddressErrorKind;
}

/** malformed address, mask or CIDR expression */
export class InvalidInputError extends AddressError {
    readonly kind = "InvalidInput";

    constructor(reason: string) {
        super(reason);
        this.name = InvalidInputError.name;
    }
}

/** prefix length or paging argument outside of its legal bounds */
export class InvalidRangeError extends AddressError {
    readonly kind = "InvalidRange";

    constructor(reason: string) {
        super(reason);
        this.name = InvalidRangeError.name;
    }
}
