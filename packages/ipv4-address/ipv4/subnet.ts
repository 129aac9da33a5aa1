import { or, xor, from } from "uint8array-utils";
import type { AddressMask } from "../mask";
import { classifyIPV4Address, type IPV4AddressClass } from "./class";
import { IPV4Address } from "./ipv4";
import { classifyIPV4AddressSpace, type IPV4AddressSpace } from "./reserved";

/**
 * Usable hosts of a network. Prefix lengths 31 and 32 have none,
 * the point-to-point reading of RFC 3021 is not applied.
 */
export type HostRange =
    | { count: number; min: IPV4Address; max: IPV4Address }
    | { count: 0; min: null; max: null };

export type SubnetReport = {
    address: IPV4Address;
    mask: AddressMask<IPV4Address>;
    prefixLength: number;
    wildcard: IPV4Address;

    networkAddress: IPV4Address;
    broadcastAddress: IPV4Address;
    addressCount: number;
    hosts: HostRange;

    addressClass: IPV4AddressClass;
    addressSpace: IPV4AddressSpace;

    binaryMask: string;
    binaryNetworkAddress: string;

    /** in-addr.arpa zone made of the octets covered by the prefix */
    reverseDns: string;
    /** in-addr.arpa name of the network address itself */
    reversePointer: string;
};

const LAST_BIT = from([0, 0, 0, 1]);

export function calculateBroadcastIPV4(networkAddress: IPV4Address, mask: AddressMask<IPV4Address>): IPV4Address {
    return new IPV4Address(or(networkAddress.buffer, mask.wildcard.buffer));
}

export function calculateHostRangeIPV4(networkAddress: IPV4Address, broadcastAddress: IPV4Address, prefixLength: number): HostRange {
    if (prefixLength >= IPV4Address.ADDRESS_LENGTH - 1) {
        return { count: 0, min: null, max: null };
    }

    // the network address ends in 0 and the broadcast in 1, flipping the last bit steps one inwards
    return {
        count: 2 ** (IPV4Address.ADDRESS_LENGTH - prefixLength) - 2,
        min: new IPV4Address(xor(networkAddress.buffer, LAST_BIT)),
        max: new IPV4Address(xor(broadcastAddress.buffer, LAST_BIT)),
    };
}

/** expects a valid prefix mask, see {@link createMask} */
export function calculateSubnetIPV4(address: IPV4Address, mask: AddressMask<IPV4Address>): SubnetReport {
    let prefixLength = mask.length,
        networkAddress = mask.mask(address),
        broadcastAddress = calculateBroadcastIPV4(networkAddress, mask);

    return {
        address: new IPV4Address(address),
        mask: mask,
        prefixLength: prefixLength,
        wildcard: mask.wildcard,

        networkAddress: networkAddress,
        broadcastAddress: broadcastAddress,
        addressCount: 2 ** (IPV4Address.ADDRESS_LENGTH - prefixLength),
        hosts: calculateHostRangeIPV4(networkAddress, broadcastAddress, prefixLength),

        addressClass: classifyIPV4Address(networkAddress),
        addressSpace: classifyIPV4AddressSpace(networkAddress, prefixLength),

        binaryMask: mask.toAddress().toBinaryString(),
        binaryNetworkAddress: networkAddress.toBinaryString(),

        reverseDns: networkAddress.toReverseDomain(Math.floor(prefixLength / 8)),
        reversePointer: networkAddress.toReverseDomain(),
    };
}
