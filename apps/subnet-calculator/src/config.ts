export type CalculatorConfig = {
    /** subnets per page of a listing */
    pageSize: number;
    /** pages produced on either side of the current one */
    pagesBeforeAfter: number;
};

/** a page is built in full, so its size is capped */
export const MAX_PAGE_SIZE = 1000;

export const DEFAULT_CONFIG: Readonly<CalculatorConfig> = {
    pageSize: 20,
    pagesBeforeAfter: 10,
};

const DECIMAL_REGEX = /^[0-9]{1,15}$/;

/** digits only, so `0x10`, `1e3` or `-1` are not numbers here */
export function parseDecimal(value: string): number | undefined {
    return DECIMAL_REGEX.test(value) ? parseInt(value, 10) : undefined;
}

function readInteger(value: unknown, min: number, max = Number.MAX_SAFE_INTEGER): number | undefined {
    let n = typeof value == "string" ? parseDecimal(value.trim()) : value;
    if (typeof n == "number" && Number.isInteger(n) && n >= min && n <= max) return n;
    return undefined;
}

/** unusable values fall back to the defaults */
export function resolveConfig(overrides: Partial<Record<keyof CalculatorConfig, unknown>> = {}): CalculatorConfig {
    return {
        pageSize: readInteger(overrides.pageSize, 1, MAX_PAGE_SIZE) ?? DEFAULT_CONFIG.pageSize,
        pagesBeforeAfter: readInteger(overrides.pagesBeforeAfter, 0) ?? DEFAULT_CONFIG.pagesBeforeAfter,
    };
}

const CONFIG_FLAGS: Record<string, keyof CalculatorConfig> = {
    "--page-size": "pageSize",
    "--window": "pagesBeforeAfter",
};

/**
 * Pulls `--page-size N` and `--window N` (or `--flag=N`) out of the command line.
 * Everything else is returned untouched in `rest`.
 */
export function parseConfigFlags(argv: string[]): { config: CalculatorConfig; rest: string[] } {
    let overrides: Partial<Record<keyof CalculatorConfig, unknown>> = {};
    let rest: string[] = [];

    for (let i = 0; i < argv.length; i++) {
        let [flag, inline] = argv[i].split("=", 2);
        let key = Object.hasOwn(CONFIG_FLAGS, flag) ? CONFIG_FLAGS[flag] : undefined;

        if (key === undefined) {
            rest.push(argv[i]);
        } else if (inline !== undefined) {
            overrides[key] = inline;
        } else {
            overrides[key] = argv[++i];
        }
    }

    return { config: resolveConfig(overrides), rest };
}
