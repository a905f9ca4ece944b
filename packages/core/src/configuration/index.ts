export * from "./resolveConfiguration";
export type { ResolveConfigurationResult } from "./ResolveConfigurationResult";
