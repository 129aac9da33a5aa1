import type { IPV4Address } from "./ipv4";

/**
### 3.2 Paragraph 5
Source <https://www.rfc-editor.org/rfc/rfc791>

```txt
High Order Bits   Format                           Class
---------------   -------------------------------  -----
0                 7 bits of net, 24 bits of host     a
10                14 bits of net, 16 bits of host    b
110               21 bits of net,  8 bits of host    c
111               escape to extended addressing mode
```

The escape was later split into class D, multicast (1110) <https://www.rfc-editor.org/rfc/rfc1112#section-4>
and class E, reserved (1111). Classes only matter for display, the prefix length decides the network.
*/
export type IPV4AddressClass = {
    name: IPV4AddressClassNames;
    higherOrderBits: number;
    higherOrderBitLength: number;
};

export type IPV4AddressClassNames = "A" | "B" | "C" | "D" | "E";

export const IPV4_CLASS_A = {
    name: "A",
    higherOrderBitLength: 1,
    higherOrderBits: 0,
} as const satisfies IPV4AddressClass;

export const IPV4_CLASS_B = {
    name: "B",
    higherOrderBitLength: 2,
    higherOrderBits: 0x80, // 10
} as const satisfies IPV4AddressClass;

export const IPV4_CLASS_C = {
    name: "C",
    higherOrderBitLength: 3,
    higherOrderBits: 0xc0, // 110
} as const satisfies IPV4AddressClass;

export const IPV4_CLASS_D = {
    name: "D",
    higherOrderBitLength: 4,
    higherOrderBits: 0xe0, // 1110
} as const satisfies IPV4AddressClass;

export const IPV4_CLASS_E = {
    name: "E",
    higherOrderBitLength: 4,
    higherOrderBits: 0xf0, // 1111
} as const satisfies IPV4AddressClass;

/** evaluated in order, the first class whose leading bits match wins */
export const IPV4_CLASSES = [
    IPV4_CLASS_A,
    IPV4_CLASS_B,
    IPV4_CLASS_C,
    IPV4_CLASS_D,
    IPV4_CLASS_E,
] as const satisfies Readonly<Array<IPV4AddressClass>>;

export function classifyIPV4Address(address: IPV4Address): IPV4AddressClass {
    for (let c of IPV4_CLASSES) {
        let mask = (0xff << (8 - c.higherOrderBitLength)) & 0xff;
        if ((address.buffer[0] & mask) == c.higherOrderBits) {
            return c;
        }
    }

    throw new Error("failed to classify " + address.toString());
}
