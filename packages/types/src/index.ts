export type { BagToken } from "./bag";
export type { BagConfiguration, ConfigurationDiagnostic, RemovalScanOrder, ResolvedBagConfiguration } from "./configuration";
export type { LoggingEnvironment } from "./environment";
