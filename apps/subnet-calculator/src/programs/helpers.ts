/** source <https://stackoverflow.com/a/44646838> */
export function getLengthOfLongestElement(arr: { length: number }[]): number {
    return Math.max(0, ...arr.map(s => s?.length || 0));
}

/** pads every column to its widest cell, trailing whitespace is dropped */
export function formatTable(table: string[][], joiner = "\t"): string {
    let lengths: number[] = [];

    for (let i = 0; i < getLengthOfLongestElement(table); i++) {
        lengths[i] = getLengthOfLongestElement(
            table.map(r => r[i] || "")
        );
    }

    return table.map((row) => (
        row.map((s, i) => (s || "").padEnd(lengths[i], " ")).join(joiner).trimEnd()
    )).join("\n");
}

/**
 * Removes `--name value`, `--name=value` or an alias such as `-p value` from `argv`.
 * @returns the last value given, undefined when the option is absent
 */
export function takeOption(argv: string[], names: string[]): { value?: string; rest: string[] } {
    let value: string | undefined;
    let rest: string[] = [];

    for (let i = 0; i < argv.length; i++) {
        let arg = argv[i];
        let inline = names.find(name => arg.startsWith(name + "="));

        if (inline) {
            value = arg.slice(inline.length + 1);
        } else if (names.includes(arg)) {
            value = argv[++i];
        } else {
            rest.push(arg);
        }
    }

    return { value, rest };
}
