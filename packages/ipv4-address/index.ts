export * from "./base";
export * from "./errors";
export * from "./mask";
export * from "./ipv4";
