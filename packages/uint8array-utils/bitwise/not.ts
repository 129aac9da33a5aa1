// Uint8Array truncates on assignment so ~x stays within the byte

export function not(buf: Uint8Array): Uint8Array {
    return buf.map((b) => ~b);
}
