export type Encoding = "hex" | "binary";

/**
 * - hex: two digits per byte, no separator
 * - binary: eight digits per byte, bytes joined with "."
 */
export function stringify(buf: Uint8Array, encoding: Encoding = "hex"): string {
    switch (encoding) {
        case "binary": return toBinary(buf);
        case "hex": return toHex(buf);
    }
}

function toHex(buf: Uint8Array): string {
    let str = "";

    for (let i = 0; i < buf.byteLength; i++) {
        str += buf[i].toString(16).padStart(2, "0");
    }

    return str;
}

function toBinary(buf: Uint8Array): string {
    return Array.from(buf, (b) => b.toString(2).padStart(8, "0")).join(".");
}
