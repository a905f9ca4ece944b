export const version = "PACKAGE_VERSION"; // value is replaced at build time

export * from "./bag";
export * from "./configuration";
export * from "./environment";
