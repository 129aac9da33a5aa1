import { IPV4Address } from "ipv4-address";
import { MAX_PAGE_SIZE, parseDecimal } from "../config";
import { listingQuery } from "../queries";
import { formatCount, formatHostRange } from "../overview";
import { formatTable } from "./helpers";
import { type TTYProgram, type TTYProgramInitializer, type TTYProgramMetaData, TTYProgramStatus } from "./types";

const USAGE = "usage: list <network> <prefix length> [page] [page size]\n";

export const ttyProgramList: TTYProgram = Object.assign<TTYProgramInitializer, TTYProgramMetaData>((writer, config) => ({
    run(argv) {
        return new Promise(resolve => {
            if (argv.length < 2 || argv.length > 4) {
                writer.write(USAGE);
                return resolve(TTYProgramStatus.ERROR);
            }

            let [expression, prefix, page = "1", size = config.pageSize.toString()] = argv;
            prefix = prefix.replace(/^\//, "");

            let values = [prefix, page, size];
            let [childPrefixLength, pageNumber, pageSize] = values.map(parseDecimal);

            if (childPrefixLength === undefined || pageNumber === undefined || pageSize === undefined) {
                let invalid = values.find(value => parseDecimal(value) === undefined);
                writer.write(`InvalidInput: "${invalid}" is not a decimal number\n`);
                return resolve(TTYProgramStatus.ERROR);
            }

            if (pageSize > MAX_PAGE_SIZE) {
                writer.write(`InvalidRange: page size ${pageSize} is out of range 1-${MAX_PAGE_SIZE}\n`);
                return resolve(TTYProgramStatus.ERROR);
            }

            let result = listingQuery({
                expression,
                childPrefixLength,
                pageIndex: pageNumber - 1,
                pageSize,
            });

            if (!result.success) {
                writer.write(`${result.error.kind}: ${result.error.message}\n`);
                return resolve(TTYProgramStatus.ERROR);
            }

            let { parent, prefixLength, total, pageIndex, pageCount, subnets } = result.page;
            let heading = `${formatCount(total)} /${prefixLength} subnets in ${parent.networkAddress}/${parent.prefixLength}`;

            if (subnets.length == 0) {
                writer.write(`${heading}, page ${pageIndex + 1} is past the last page ${pageCount}\n`);
                return resolve(TTYProgramStatus.OK);
            }

            let rows = subnets.map(({ index, networkAddress, broadcastAddress, hosts }) => [
                index.toString(),
                `${networkAddress}/${prefixLength}`,
                formatHostRange(hosts),
                broadcastAddress.toString(),
            ]);

            writer.write([
                `${heading}, page ${pageIndex + 1} of ${pageCount}`,
                formatTable([["#", "Network", "Host Range", "Broadcast"]].concat(rows), "  "),
            ].join("\n") + "\n");

            resolve(TTYProgramStatus.OK);
        });
    },
}), {
    about: {
        description: "Lists the subnets of a network page by page.",
        content: [
            `  list <network> <prefix length> [page] [page size]`,
            `  list 192.168.0.0/16 24 2`,
            `  list "10.0.0.0 255.0.0.0" /20 1 50`,
            `  pages start at 1, prefix lengths range from the network's own up to ${IPV4Address.ADDRESS_LENGTH}`,
        ].join("\n"),
    },
});
