import { describe, test, expect } from "vitest";
import {
    enumerateSubnetsIPV4, findSubnetIndexIPV4, InvalidRangeError, iterateSubnetsIPV4,
    IPV4Address, type IPV4Network, octetBoundaryParentIPV4, countSubnetsIPV4, nthSubnetIPV4,
} from "../index";

function network(networkAddress: string, prefixLength: number): IPV4Network {
    return { networkAddress: new IPV4Address(networkAddress), prefixLength };
}

describe("IPV4 subnet enumeration", () => {
    test("first page", () => {
        let page = enumerateSubnetsIPV4({ parent: network("192.168.0.0", 16), childPrefixLength: 24, pageIndex: 0, pageSize: 10 });

        expect(page.total).eq(256);
        expect(page.pageCount).eq(26);
        expect(page.prefixLength).eq(24);
        expect(page.subnets.map(({ networkAddress }) => networkAddress.toString())).toStrictEqual([
            "192.168.0.0", "192.168.1.0", "192.168.2.0", "192.168.3.0", "192.168.4.0",
            "192.168.5.0", "192.168.6.0", "192.168.7.0", "192.168.8.0", "192.168.9.0",
        ]);
        expect(page.subnets[9].index).eq(9);
        expect(page.subnets[9].broadcastAddress.toString()).eq("192.168.9.255");
    })

    test("last page is partial", () => {
        let page = enumerateSubnetsIPV4({ parent: network("192.168.0.0", 16), childPrefixLength: 24, pageIndex: 25, pageSize: 10 });

        expect(page.subnets.length).eq(6);
        expect(page.subnets[0].networkAddress.toString()).eq("192.168.250.0");
        expect(page.subnets[5].networkAddress.toString()).eq("192.168.255.0");
        expect(page.subnets[5].broadcastAddress.toString()).eq("192.168.255.255");
    })

    test("page beyond the end is empty", () => {
        let page = enumerateSubnetsIPV4({ parent: network("10.0.0.0", 8), childPrefixLength: 24, pageIndex: 1_000_000, pageSize: 20 });

        expect(page.total).eq(65536);
        expect(page.pageCount).eq(3277);
        expect(page.subnets).toStrictEqual([]);
    })

    test("host ranges of children", () => {
        let page = enumerateSubnetsIPV4({ parent: network("10.0.0.0", 24), childPrefixLength: 30, pageIndex: 0, pageSize: 2 });

        expect(page.total).eq(64);
        expect(page.subnets.map(({ hosts }) => [hosts.count, hosts.min?.toString(), hosts.max?.toString()])).toStrictEqual([
            [2, "10.0.0.1", "10.0.0.2"],
            [2, "10.0.0.5", "10.0.0.6"],
        ]);
    })

    test("largest split stays cheap", () => {
        let page = enumerateSubnetsIPV4({ parent: network("0.0.0.0", 0), childPrefixLength: 32, pageIndex: 214748364, pageSize: 20 });

        expect(page.total).eq(4294967296);
        expect(page.pageCount).eq(214748365);
        expect(page.subnets.length).eq(16);
        expect(page.subnets[0].index).eq(4294967280);
        expect(page.subnets[0].networkAddress.toString()).eq("255.255.255.240");
        expect(page.subnets[15].networkAddress.toString()).eq("255.255.255.255");
        expect(page.subnets[15].hosts.count).eq(0);
    })

    test("same prefix length yields the parent", () => {
        let page = enumerateSubnetsIPV4({ parent: network("172.16.0.0", 12), childPrefixLength: 12, pageIndex: 0, pageSize: 20 });

        expect(page.total).eq(1);
        expect(page.subnets.length).eq(1);
        expect(page.subnets[0].networkAddress.toString()).eq("172.16.0.0");
        expect(page.subnets[0].broadcastAddress.toString()).eq("172.31.255.255");
    })

    test("parent host bits are cleared", () => {
        let page = enumerateSubnetsIPV4({ parent: network("192.168.77.9", 16), childPrefixLength: 17, pageIndex: 0, pageSize: 5 });

        expect(page.parent.networkAddress.toString()).eq("192.168.0.0");
        expect(page.subnets.map(({ networkAddress }) => networkAddress.toString())).toStrictEqual(["192.168.0.0", "192.168.128.0"]);
    })

    test("invalid ranges", () => {
        let parent = network("192.168.0.0", 16);

        expect(() => enumerateSubnetsIPV4({ parent, childPrefixLength: 8, pageIndex: 0, pageSize: 10 })).toThrow(InvalidRangeError);
        expect(() => enumerateSubnetsIPV4({ parent, childPrefixLength: 33, pageIndex: 0, pageSize: 10 })).toThrow(InvalidRangeError);
        expect(() => enumerateSubnetsIPV4({ parent, childPrefixLength: 24.5, pageIndex: 0, pageSize: 10 })).toThrow(InvalidRangeError);
        expect(() => enumerateSubnetsIPV4({ parent, childPrefixLength: 24, pageIndex: -1, pageSize: 10 })).toThrow(InvalidRangeError);
        expect(() => enumerateSubnetsIPV4({ parent, childPrefixLength: 24, pageIndex: 0, pageSize: 0 })).toThrow(InvalidRangeError);
        expect(() => countSubnetsIPV4(16, 8)).toThrow("subnet prefix length 8 is out of range 16-32");
    })

    test("iteration is lazy and restartable", () => {
        let parent = network("0.0.0.0", 0);
        let seen: string[] = [];

        // 2 ** 32 children, only the ones pulled are computed
        for (let { networkAddress } of iterateSubnetsIPV4(parent, 32, 10)) {
            seen.push(networkAddress.toString());
            if (seen.length == 2) break;
        }
        expect(seen).toStrictEqual(["0.0.0.10", "0.0.0.11"]);

        let again = iterateSubnetsIPV4(parent, 32, 10, 12);
        expect(Array.from(again, ({ index }) => index)).toStrictEqual([10, 11]);
    })

    test("subnet at an index", () => {
        let subnet = nthSubnetIPV4(network("10.0.0.0", 8), 24, 300);

        expect(subnet.networkAddress.toString()).eq("10.1.44.0");
        expect(subnet.broadcastAddress.toString()).eq("10.1.44.255");
        expect(subnet.hosts.count).eq(254);
    })

    test("index of a subnet", () => {
        expect(findSubnetIndexIPV4(network("192.168.0.0", 16), network("192.168.9.0", 24))).eq(9);
        expect(findSubnetIndexIPV4(network("10.10.10.0", 24), network("10.10.10.12", 30))).eq(3);
    })

    test("octet boundary parent", () => {
        let parent = (address: string, prefixLength: number) => {
            let { networkAddress, prefixLength: length } = octetBoundaryParentIPV4(network(address, prefixLength));
            return `${networkAddress}/${length}`;
        };

        expect(parent("10.10.10.0", 30)).eq("10.10.10.0/24");
        expect(parent("10.10.0.0", 19)).eq("10.10.0.0/16");
        expect(parent("10.10.0.0", 15)).eq("10.0.0.0/8");
        expect(parent("10.0.0.0", 8)).eq("10.0.0.0/8");
        expect(parent("0.0.0.0", 0)).eq("0.0.0.0/8");
    })
})
