export * from "./assertions";
