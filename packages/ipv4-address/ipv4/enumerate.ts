import { InvalidRangeError } from "../errors";
import { createMask } from "../mask";
import { IPV4Address } from "./ipv4";
import { calculateBroadcastIPV4, calculateHostRangeIPV4, type HostRange } from "./subnet";

export type IPV4Network = {
    networkAddress: IPV4Address;
    prefixLength: number;
};

export type SubnetEntry = IPV4Network & {
    /** position within the parent network */
    index: number;
    broadcastAddress: IPV4Address;
    hosts: HostRange;
};

export type SubnetPage = {
    parent: IPV4Network;
    prefixLength: number;
    /** number of children in the parent */
    total: number;
    pageIndex: number;
    pageSize: number;
    pageCount: number;
    subnets: SubnetEntry[];
};

export type EnumerateSubnetsOptions = {
    parent: IPV4Network;
    childPrefixLength: number;
    pageIndex: number;
    pageSize: number;
};

function assertPrefixLengths(parentPrefixLength: number, childPrefixLength: number) {
    if (!Number.isInteger(parentPrefixLength) || parentPrefixLength < 0 || parentPrefixLength > IPV4Address.ADDRESS_LENGTH) {
        throw new InvalidRangeError(`parent prefix length ${parentPrefixLength} is out of range 0-${IPV4Address.ADDRESS_LENGTH}`);
    }

    if (!Number.isInteger(childPrefixLength) || childPrefixLength < parentPrefixLength || childPrefixLength > IPV4Address.ADDRESS_LENGTH) {
        throw new InvalidRangeError(`subnet prefix length ${childPrefixLength} is out of range ${parentPrefixLength}-${IPV4Address.ADDRESS_LENGTH}`);
    }
}

/** @throws InvalidRangeError */
export function countSubnetsIPV4(parentPrefixLength: number, childPrefixLength: number): number {
    assertPrefixLengths(parentPrefixLength, childPrefixLength);
    return 2 ** (childPrefixLength - parentPrefixLength);
}

/** the child network at `index`, computed directly from the index */
export function nthSubnetIPV4(parent: IPV4Network, childPrefixLength: number, index: number): SubnetEntry {
    let mask = createMask(IPV4Address, childPrefixLength);
    let base = createMask(IPV4Address, parent.prefixLength).mask(parent.networkAddress).toNumber();

    let networkAddress = IPV4Address.fromNumber(base + index * 2 ** (IPV4Address.ADDRESS_LENGTH - childPrefixLength)),
        broadcastAddress = calculateBroadcastIPV4(networkAddress, mask);

    return {
        index,
        networkAddress,
        prefixLength: childPrefixLength,
        broadcastAddress,
        hosts: calculateHostRangeIPV4(networkAddress, broadcastAddress, childPrefixLength),
    };
}

/**
 * Lazily yields the children with index in `[start, end)`. Nothing is produced ahead of
 * time, calling it again restarts from `start`.
 * @throws InvalidRangeError
 */
export function* iterateSubnetsIPV4(parent: IPV4Network, childPrefixLength: number, start = 0, end?: number): Generator<SubnetEntry, void, undefined> {
    let total = countSubnetsIPV4(parent.prefixLength, childPrefixLength);
    let stop = Math.min(end ?? total, total);

    for (let i = Math.max(0, start); i < stop; i++) {
        yield nthSubnetIPV4(parent, childPrefixLength, i);
    }
}

/**
 * Produces one page of the children of `parent`. A page past the end is empty.
 * @throws InvalidRangeError
 */
export function enumerateSubnetsIPV4({ parent, childPrefixLength, pageIndex, pageSize }: EnumerateSubnetsOptions): SubnetPage {
    let total = countSubnetsIPV4(parent.prefixLength, childPrefixLength);

    if (!Number.isInteger(pageIndex) || pageIndex < 0) {
        throw new InvalidRangeError(`page index ${pageIndex} must be a non-negative integer`);
    }
    if (!Number.isInteger(pageSize) || pageSize < 1) {
        throw new InvalidRangeError(`page size ${pageSize} must be a positive integer`);
    }

    let pageCount = Math.max(1, Math.ceil(total / pageSize));
    let subnets: SubnetEntry[] = [];

    if (pageIndex < pageCount) {
        let start = pageIndex * pageSize;
        subnets = Array.from(iterateSubnetsIPV4(parent, childPrefixLength, start, start + pageSize));
    }

    return {
        parent: {
            networkAddress: createMask(IPV4Address, parent.prefixLength).mask(parent.networkAddress),
            prefixLength: parent.prefixLength,
        },
        prefixLength: childPrefixLength,
        total,
        pageIndex,
        pageSize,
        pageCount,
        subnets,
    };
}

/** index of `child` within `parent`, both have to be network addresses */
export function findSubnetIndexIPV4(parent: IPV4Network, child: IPV4Network): number {
    assertPrefixLengths(parent.prefixLength, child.prefixLength);

    let offset = child.networkAddress.toNumber() - parent.networkAddress.toNumber();
    return Math.floor(offset / 2 ** (IPV4Address.ADDRESS_LENGTH - child.prefixLength));
}

/**
 * The network used to list the siblings of a network: the /24, /16 or /8 network containing it.
 * @example 10.10.10.0/30 -> 10.10.10.0/24, 172.16.0.0/19 -> 172.16.0.0/16, 192.0.0.0/15 -> 192.0.0.0/8
 */
export function octetBoundaryParentIPV4({ networkAddress, prefixLength }: IPV4Network): IPV4Network {
    let parentPrefixLength = 8;

    for (let boundary of [24, 16]) {
        if (prefixLength > boundary) {
            parentPrefixLength = boundary;
            break;
        }
    }

    return {
        networkAddress: createMask(IPV4Address, parentPrefixLength).mask(networkAddress),
        prefixLength: parentPrefixLength,
    };
}
