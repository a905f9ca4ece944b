import type { BagConfiguration, ConfigurationDiagnostic, RemovalScanOrder, ResolvedBagConfiguration } from "@tokenbag/types";
import type { ResolveConfigurationResult } from "./ResolveConfigurationResult";

const defaultValues: ResolvedBagConfiguration = {
    removalScanOrder: "newestFirst",
    warnOnUnknownToken: false,
};

/**
 * Changes the provided configuration to have all its properties resolved to a value.
 * @param config - Configuration to resolve.
 */
export function resolveConfiguration(config: Partial<BagConfiguration>): ResolveConfigurationResult<ResolvedBagConfiguration> {
    const remainingConfig: Record<string, unknown> = { ...config };
    const diagnostics: ConfigurationDiagnostic[] = [];

    const resolvedConfig: ResolvedBagConfiguration = {
        removalScanOrder: getRemovalScanOrder(),
        warnOnUnknownToken: getValue("warnOnUnknownToken", defaultValues.warnOnUnknownToken, ensureBoolean),
    };

    addExcessPropertyDiagnostics();

    return {
        config: resolvedConfig,
        diagnostics,
    };

    function getRemovalScanOrder(): RemovalScanOrder {
        const propertyName: keyof BagConfiguration = "removalScanOrder";
        const removalScanOrder = remainingConfig[propertyName];
        delete remainingConfig[propertyName];

        if (removalScanOrder === "newestFirst" || removalScanOrder === "oldestFirst")
            return removalScanOrder;
        if (removalScanOrder == null)
            return defaultValues.removalScanOrder;

        diagnostics.push({
            propertyName,
            message: `Unknown configuration specified for '${propertyName}': ${String(removalScanOrder)}`,
        });
        return defaultValues.removalScanOrder;
    }

    function getValue<TValue>(
        key: keyof BagConfiguration,
        defaultValue: TValue,
        validateFunc: (key: keyof BagConfiguration, value: unknown) => value is TValue,
    ) {
        const value = remainingConfig[key];
        delete remainingConfig[key];

        if (value == null || !validateFunc(key, value))
            return defaultValue;

        return value;
    }

    function ensureBoolean(key: keyof BagConfiguration, value: unknown): value is boolean {
        if (typeof value === "boolean")
            return true;

        diagnostics.push({
            propertyName: key,
            message: `Expected the configuration for '${key}' to be a boolean, but its value was: ${String(value)}`,
        });
        return false;
    }

    function addExcessPropertyDiagnostics() {
        for (const propertyName in remainingConfig) {
            diagnostics.push({
                propertyName,
                message: `Unknown property in configuration: ${propertyName}`,
            });
        }
    }
}
