import { alloc } from "../misc";

/** applies `op` byte by byte, both operands must have the same length */
export function combine(a: Uint8Array, b: Uint8Array, op: (x: number, y: number) => number): Uint8Array {
    if (a.length != b.length) {
        throw new RangeError(`operand lengths differ: ${a.length} != ${b.length}`);
    }

    let i = a.length;
    const dest = alloc(i);

    while (i--) {
        dest[i] = op(a[i], b[i]);
    }

    return dest;
}
