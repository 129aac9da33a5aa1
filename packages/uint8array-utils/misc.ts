export function alloc(size: number, fill: number = 0): Uint8Array {
    return new Uint8Array(size).fill(fill);
}

export function from(input: Uint8Array): Uint8Array;
export function from(input: number[]): Uint8Array;
export function from(input: number, len?: number): Uint8Array;
export function from(input: Uint8Array | number[] | number, len?: number): Uint8Array {
    if (input instanceof Uint8Array || Array.isArray(input)) {
        return new Uint8Array(input);
    }

    return fromNumber(input, len);
}

/**
 * Writes an unsigned integer big-endian into `len` bytes.
 * Works beyond 32 bits (up to `Number.MAX_SAFE_INTEGER`) since it divides instead of shifting.
 * @throws RangeError when the value is negative, fractional or does not fit
 */
export function fromNumber(n: number, len: number = 4): Uint8Array {
    if (!Number.isSafeInteger(n) || n < 0) {
        throw new RangeError(n + ": is not an unsigned integer");
    }

    let buf = alloc(len);
    let i = len;
    while (i--) {
        buf[i] = n % 256;
        n = Math.floor(n / 256);
    }

    if (n > 0) {
        throw new RangeError("value does not fit in " + len + " bytes");
    }

    return buf;
}

/** Reads the bytes big-endian as an unsigned integer. */
export function toNumber(buf: Uint8Array): number {
    let n = 0;
    for (let i = 0; i < buf.length; i++) {
        n = n * 256 + buf[i];
    }

    return n;
}

/** population count */
export function countBits(buf: Uint8Array): number {
    let count = 0;

    for (let byte of buf) {
        while (byte) {
            count += byte & 1;
            byte >>>= 1;
        }
    }

    return count;
}
