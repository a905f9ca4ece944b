export * from "./Bag";
export * from "./BagIterator";
