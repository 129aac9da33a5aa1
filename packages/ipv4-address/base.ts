export abstract class BaseAddress {
    abstract readonly buffer: Uint8Array;

    abstract toString(): string;
}

/** the static side of an address class, what {@link AddressMask} needs to build addresses */
export interface AddressConstructor<A extends BaseAddress> {
    readonly ADDRESS_LENGTH: number;
    parse(input: string): Uint8Array;
    new(input: Uint8Array): A;
}
