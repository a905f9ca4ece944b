/** The order a bag scans its entries in when removing by token. */
export type RemovalScanOrder = "newestFirst" | "oldestFirst";

/**
 * A bag's configuration.
 */
export interface BagConfiguration {
    /**
     * The order to search for a token when removing.
     * @default "newestFirst"
     * @value "newestFirst" - Searches from the most recently inserted entry back to the oldest. Fastest when recently inserted entries are removed soonest.
     * @value "oldestFirst" - Searches from the oldest entry forward.
     */
    removalScanOrder?: RemovalScanOrder;
    /**
     * Whether to write a warning to the environment when a removal is given a token that isn't in the bag.
     * @default false
     */
    warnOnUnknownToken?: boolean;
}

export interface ResolvedBagConfiguration {
    readonly removalScanOrder: RemovalScanOrder;
    readonly warnOnUnknownToken: boolean;
}

/** Represents a problem with a configuration. */
export interface ConfigurationDiagnostic {
    /** The property name the problem occurred on. */
    propertyName: string;
    /** The diagnostic's message that should be displayed to the user. */
    message: string;
}
