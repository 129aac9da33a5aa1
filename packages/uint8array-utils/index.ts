export * from "./misc";
export * from "./stringify";
export { and } from "./bitwise/and";
export { or } from "./bitwise/or";
export { xor } from "./bitwise/xor";
export { not } from "./bitwise/not";
