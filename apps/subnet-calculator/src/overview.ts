import {
    countSubnetsIPV4, findSubnetIndexIPV4, type HostRange, type IPV4Network, iterateSubnetsIPV4,
    octetBoundaryParentIPV4, type SubnetEntry, type SubnetReport,
} from "ipv4-address";
import type { CalculatorConfig } from "./config";

const NOT_AVAILABLE = "N/A";

export type OverviewEntry = {
    index: number;
    /** 1-based */
    page: number;
    network: string;
    range: string;
    broadcast: string;
    /** the network the overview was built for */
    current: boolean;
};

export type OverviewListing = {
    /** false when the network already sits on an octet boundary and has no siblings to list */
    shown: boolean;
    parent: string;
    description: string;
    total: number;
    pageCount: number;
    currentPage: number;
    currentIndex: number;
    windowStartPage: number;
    windowEndPage: number;
    /** entries of every page from windowStartPage to windowEndPage */
    entries: OverviewEntry[];
};

export type CalculatorOverview = {
    network: string;
    broadcast: string;
    hostMin: string;
    hostMax: string;
    hostRange: string;
    hostsUsable: string;
    netmask: string;
    wildcard: string;
    binaryMask: string;
    binaryId: string;
    cidr: string;
    ipClass: string;
    ipType: string;
    reverseDns: string;

    fields: Array<[label: string, value: string]>;
    /** one "label: value" line per field */
    summary: string;
    listing: OverviewListing;
};

export function formatCount(n: number): string {
    return n.toLocaleString("en-US");
}

export function formatHostRange(hosts: HostRange): string {
    return hosts.min && hosts.max ? `${hosts.min} - ${hosts.max}` : NOT_AVAILABLE;
}

/** 10.100.0.0/16 -> 10.100.*.* */
export function starNotate({ networkAddress, prefixLength }: IPV4Network): string {
    let kept = Math.floor(prefixLength / 8);
    return Array.from(networkAddress.buffer, (octet, i) => i < kept ? octet.toString() : "*").join(".");
}

function toEntry(entry: SubnetEntry, pageSize: number, currentIndex: number): OverviewEntry {
    return {
        index: entry.index,
        page: Math.floor(entry.index / pageSize) + 1,
        network: entry.networkAddress.toString(),
        range: formatHostRange(entry.hosts),
        broadcast: entry.broadcastAddress.toString(),
        current: entry.index == currentIndex,
    };
}

function buildListing(report: SubnetReport, config: CalculatorConfig, requestedPage?: number): OverviewListing {
    let network: IPV4Network = { networkAddress: report.networkAddress, prefixLength: report.prefixLength };
    let parent = octetBoundaryParentIPV4(network);
    let cidr = `${report.networkAddress}/${report.prefixLength}`;

    if (parent.prefixLength >= report.prefixLength) {
        let self: SubnetEntry = { ...network, index: 0, broadcastAddress: report.broadcastAddress, hosts: report.hosts };
        return {
            shown: false,
            parent: cidr,
            description: `Network: ${cidr}`,
            total: 1,
            pageCount: 1,
            currentPage: 1,
            currentIndex: 0,
            windowStartPage: 1,
            windowEndPage: 1,
            entries: [toEntry(self, config.pageSize, 0)],
        };
    }

    let { pageSize, pagesBeforeAfter } = config;
    let total = countSubnetsIPV4(parent.prefixLength, report.prefixLength),
        pageCount = Math.max(1, Math.ceil(total / pageSize)),
        currentIndex = findSubnetIndexIPV4(parent, network);

    // the requested page wins over the page holding the network
    let currentPage = requestedPage !== undefined && Number.isInteger(requestedPage)
        ? Math.max(1, Math.min(requestedPage, pageCount))
        : Math.floor(currentIndex / pageSize) + 1;

    let windowStartPage = Math.max(1, currentPage - pagesBeforeAfter),
        windowEndPage = Math.min(pageCount, currentPage + pagesBeforeAfter);

    let entries = Array.from(
        iterateSubnetsIPV4(parent, report.prefixLength, (windowStartPage - 1) * pageSize, windowEndPage * pageSize),
        (entry) => toEntry(entry, pageSize, currentIndex)
    );

    return {
        shown: true,
        parent: `${parent.networkAddress}/${parent.prefixLength}`,
        description: `All ${formatCount(total)} Possible /${report.prefixLength} Networks in ${starNotate(parent)}`,
        total,
        pageCount,
        currentPage,
        currentIndex,
        windowStartPage,
        windowEndPage,
        entries,
    };
}

/**
 * Turns a report into display strings plus the window of sibling networks around it.
 * @param requestedPage 1-based, clamped to the available pages
 */
export function buildOverview(report: SubnetReport, config: CalculatorConfig, requestedPage?: number): CalculatorOverview {
    let cidr = `${report.networkAddress}/${report.prefixLength}`;

    let overview = {
        network: report.networkAddress.toString(),
        broadcast: report.broadcastAddress.toString(),
        hostMin: report.hosts.min?.toString() ?? NOT_AVAILABLE,
        hostMax: report.hosts.max?.toString() ?? NOT_AVAILABLE,
        hostRange: formatHostRange(report.hosts),
        hostsUsable: formatCount(report.hosts.count),
        netmask: report.mask.toString(),
        wildcard: report.wildcard.toString(),
        binaryMask: report.binaryMask,
        binaryId: report.binaryNetworkAddress,
        cidr,
        ipClass: report.addressClass.name,
        ipType: report.addressSpace.type,
        reverseDns: report.reverseDns,
    };

    let fields: Array<[label: string, value: string]> = [
        ["Address", report.address.toString()],
        ["Network Address", overview.network],
        ["Usable Host Range", overview.hostRange],
        ["Broadcast Address", overview.broadcast],
        ["Usable Hosts", overview.hostsUsable],
        ["Total Addresses", formatCount(report.addressCount)],
        ["Subnet Mask", overview.netmask],
        ["Wildcard Mask", overview.wildcard],
        ["Binary Subnet Mask", overview.binaryMask],
        ["Binary ID", overview.binaryId],
        ["CIDR Notation", overview.cidr],
        ["IP Class", overview.ipClass],
        ["IP Type", report.addressSpace.scope ? `${overview.ipType} (${report.addressSpace.scope})` : overview.ipType],
        ["in-addr.arpa", overview.reverseDns],
    ];

    return {
        ...overview,
        fields,
        summary: fields.map(([label, value]) => `${label}: ${value}`).join("\n"),
        listing: buildListing(report, config, requestedPage),
    };
}
