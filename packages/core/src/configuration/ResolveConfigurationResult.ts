import type { ConfigurationDiagnostic } from "@tokenbag/types";

/** The result of resolving configuration. */
export interface ResolveConfigurationResult<ResolvedConfiguration> {
    /** The diagnostics, if any. */
    diagnostics: ConfigurationDiagnostic[];
    /** The resolved configuration. */
    config: ResolvedConfiguration;
}
