// Splits a command line into arguments

export type ParsedArgs = {
    args: string[];
    /** index of the argument under the cursor, -1 when the cursor is between arguments */
    active: number;
};

/**
 * Whitespace separates arguments. Single or double quotes group, a backslash inside quotes
 * escapes the quote character or another backslash.
 */
export function args_parse_ext(input: string, cursor: number = input.length): ParsedArgs {
    const args: string[] = [];
    let active = -1;

    let current = "", inArg = false, start = 0;
    let quote: undefined | '"' | "'" = undefined;

    const push = (end: number) => {
        if (!inArg) return;
        if (active < 0 && cursor >= start && cursor <= end) {
            active = args.length;
        }
        args.push(current);
        current = "";
        inArg = false;
    };

    for (let i = 0; i < input.length; i++) {
        let c = input[i];

        if (quote) {
            let next = input[i + 1];
            if (c == "\\" && (next == quote || next == "\\")) {
                current += next;
                i++;
            } else if (c == quote) {
                quote = undefined;
            } else {
                current += c;
            }
            continue;
        }

        if (c == " " || c == "\t" || c == "\n") {
            push(i);
            continue;
        }

        if (!inArg) {
            inArg = true;
            start = i;
        }

        if (c == '"' || c == "'") {
            quote = c;
        } else {
            current += c;
        }
    }

    push(input.length);

    return { args, active };
}

export function args_parse(input: string): string[] {
    return args_parse_ext(input).args;
}
