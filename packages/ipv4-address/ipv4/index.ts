export * from "./ipv4";
export * from "./class";
export * from "./reserved";
export * from "./subnet";
export * from "./parse-input";
export * from "./enumerate";
