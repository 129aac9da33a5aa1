import {
    AddressError, calculateSubnetIPV4, enumerateSubnetsIPV4, parseIPV4Input,
    type ParsedIPV4Input, type SubnetPage, type SubnetReport,
} from "ipv4-address";
import { type CalculatorConfig, DEFAULT_CONFIG } from "./config";
import { buildOverview, type CalculatorOverview } from "./overview";

export type QueryFailure = {
    success: false;
    error: AddressError;
};

export type CalculationResult = {
    success: true;
    report: SubnetReport;
    overview: CalculatorOverview;
} | QueryFailure;

export type ListingQuery = {
    expression: string;
    childPrefixLength: number;
    /** 0-based */
    pageIndex: number;
    pageSize: number;
};

export type ListingResult = {
    success: true;
    parent: ParsedIPV4Input;
    page: SubnetPage;
} | QueryFailure;

/** only validation errors become a failure result, anything else is a bug and propagates */
function capture<T>(fn: () => T): T | QueryFailure {
    try {
        return fn();
    } catch (error) {
        if (error instanceof AddressError) {
            return { success: false, error };
        }
        throw error;
    }
}

export function calculationQuery(expression: string, options: { config?: CalculatorConfig; page?: number } = {}): CalculationResult {
    return capture<CalculationResult>(() => {
        let { address, mask } = parseIPV4Input(expression);
        let report = calculateSubnetIPV4(address, mask);

        return {
            success: true,
            report,
            overview: buildOverview(report, options.config ?? DEFAULT_CONFIG, options.page),
        };
    });
}

export function listingQuery({ expression, childPrefixLength, pageIndex, pageSize }: ListingQuery): ListingResult {
    return capture<ListingResult>(() => {
        let parent = parseIPV4Input(expression);
        let page = enumerateSubnetsIPV4({
            parent: {
                networkAddress: parent.mask.mask(parent.address),
                prefixLength: parent.mask.length,
            },
            childPrefixLength,
            pageIndex,
            pageSize,
        });

        return { success: true, parent, page };
    });
}
