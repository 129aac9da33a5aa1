import { parseDecimal } from "../config";
import { calculationQuery } from "../queries";
import { formatTable, takeOption } from "./helpers";
import { type TTYProgram, type TTYProgramInitializer, type TTYProgramMetaData, TTYProgramStatus } from "./types";

export const ttyProgramCalc: TTYProgram = Object.assign<TTYProgramInitializer, TTYProgramMetaData>((writer, config) => ({
    run(argv) {
        return new Promise(resolve => {
            let { value, rest } = takeOption(argv, ["--page", "-p"]);

            let page = value === undefined ? undefined : parseDecimal(value);
            if (value !== undefined && page === undefined) {
                writer.write(`page "${value}" is not a number\n`);
                return resolve(TTYProgramStatus.ERROR);
            }

            // the mask form is two words, so the expression is everything that is left
            let result = calculationQuery(rest.join(" "), { config, page });
            if (!result.success) {
                writer.write(`${result.error.kind}: ${result.error.message}\n`);
                return resolve(TTYProgramStatus.ERROR);
            }

            let { fields, listing } = result.overview;
            let rows = listing.entries
                .filter(entry => entry.page == listing.currentPage)
                .map(entry => [entry.current ? "*" : " ", entry.network, entry.range, entry.broadcast]);

            writer.write([
                formatTable(fields, "  "),
                "",
                listing.description,
                formatTable([[" ", "Network", "Host Range", "Broadcast"]].concat(rows), "  "),
                `Page ${listing.currentPage} of ${listing.pageCount}`,
            ].join("\n") + "\n");

            resolve(TTYProgramStatus.OK);
        });
    },
}), {
    about: {
        description: "Calculates the network of an address and lists its neighbours.",
        content: [
            "  calc <address>/<prefix length>",
            "  calc <address> <subnet mask>",
            "  calc <address> <wildcard mask>",
            "  calc <address>",
            "  -p, --page <n>    page of the neighbour listing to show",
        ].join("\n"),
    },
});
