import { combine } from "./shared";

export function xor(a: Uint8Array, b: Uint8Array): Uint8Array {
    return combine(a, b, (x, y) => x ^ y);
}
