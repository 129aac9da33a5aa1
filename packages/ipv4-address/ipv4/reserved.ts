import { createMask, type AddressMask } from "../mask";
import { IPV4Address } from "./ipv4";

// SOURCE of SOURCES <https://www.rfc-editor.org/rfc/rfc6890#section-2.2.2>

export type AddressScope = "SOFTWARE" // <https://www.rfc-editor.org/rfc/rfc1122#section-3.2.1.3>
    | "PRIVATE_USE" // <https://www.rfc-editor.org/rfc/rfc1918>
    | "SHARED_ADDRESS_SPACE"  // <https://datatracker.ietf.org/doc/html/rfc6598>
    | "LOOPBACK" // <https://www.rfc-editor.org/rfc/rfc1122#section-3.2.1.3>
    | "LINK_LOCAL" // <https://www.rfc-editor.org/rfc/rfc3927>
    | "PROTOCOL_ASSIGNMENT" // <https://www.rfc-editor.org/rfc/rfc6890#section-2.1>
    | "TEST_NET" // <https://www.rfc-editor.org/rfc/rfc5737>
    | "6TO4_RELAY_ANYCAST" // <https://www.rfc-editor.org/rfc/rfc7526>
    | "BENCHMARK" // <https://www.rfc-editor.org/rfc/rfc2544>
    | "RESERVED" // <https://www.rfc-editor.org/rfc/rfc1112#section-4>
    | "MULTICAST" // <https://www.rfc-editor.org/rfc/rfc5771>
    | "BROADCAST"; // <https://www.rfc-editor.org/rfc/rfc0919#section-7>

export type ReservedAddress = [address: string, maskLength: number, scope: AddressScope];

export const reservedAddresses: ReadonlyArray<ReservedAddress> = [
    ["0.0.0.0", 8, "SOFTWARE"],
    ["10.0.0.0", 8, "PRIVATE_USE"],
    ["172.16.0.0", 12, "PRIVATE_USE"],
    ["192.168.0.0", 16, "PRIVATE_USE"],
    ["100.64.0.0", 10, "SHARED_ADDRESS_SPACE"], // Carrier-Grade NAT (CGN) devices
    ["169.254.0.0", 16, "LINK_LOCAL"],
    ["127.0.0.0", 8, "LOOPBACK"],
    ["192.0.0.0", 29, "PROTOCOL_ASSIGNMENT"], // DS-Lite, the rest of 192.0.0.0/24 is routable
    ["192.0.0.170", 31, "PROTOCOL_ASSIGNMENT"], // NAT64/DNS64 discovery
    ["192.0.2.0", 24, "TEST_NET"], //  TEST-NET-1
    ["198.51.100.0", 24, "TEST_NET"], //  TEST-NET-2
    ["203.0.113.0", 24, "TEST_NET"], //  TEST-NET-3
    ["192.88.99.0", 24, "6TO4_RELAY_ANYCAST"],
    ["198.18.0.0", 15, "BENCHMARK"],
    ["224.0.0.0", 4, "MULTICAST"],
    ["255.255.255.255", 32, "BROADCAST"], // ahead of 240.0.0.0/4 which contains it
    ["240.0.0.0", 4, "RESERVED"],
];

/** scopes outside of these are routable and count as public */
export const PRIVATE_SCOPES: ReadonlySet<AddressScope> = new Set<AddressScope>([
    "SOFTWARE",
    "PRIVATE_USE",
    "LOOPBACK",
    "LINK_LOCAL",
    "PROTOCOL_ASSIGNMENT",
    "TEST_NET",
    "BENCHMARK",
    "RESERVED",
    "BROADCAST",
]);

export type IPV4AddressSpace = {
    type: "Private" | "Public";
    /** the reserved block containing the network, undefined for ordinary public addresses */
    scope?: AddressScope;
};

const reservedRules: ReadonlyArray<[IPV4Address, AddressMask<IPV4Address>, AddressScope]> = reservedAddresses.map(
    ([address, maskLength, scope]) => [new IPV4Address(address), createMask(IPV4Address, maskLength), scope]
);

/**
 * Finds the first reserved block that holds the whole network.
 * A network wider than the block, e.g. 10.0.0.0/7, is not inside it.
 */
export function classifyIPV4AddressSpace(networkAddress: IPV4Address, prefixLength: number): IPV4AddressSpace {
    for (let [address, mask, scope] of reservedRules) {
        if (prefixLength >= mask.length && mask.compare(address, networkAddress)) {
            return {
                type: PRIVATE_SCOPES.has(scope) ? "Private" : "Public",
                scope,
            };
        }
    }

    return { type: "Public" };
}
