export * from "./errors";
export * from "./password";
export * from "./classifier";
export * from "./entropy";
export * from "./patterns";
export * from "./common";
export * from "./analyzer";
export * from "./policy";
export * from "./random";
export * from "./generator";
export * from "./report";
export * from "./audit";
