/**
 * A uniquely identifying token for removing a value that was inserted into a bag.
 *
 * Tokens are minted by the bag and should be treated as opaque.
 */
export type BagToken = bigint;
