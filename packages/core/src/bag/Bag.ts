import type { BagConfiguration, BagToken, LoggingEnvironment, ResolvedBagConfiguration } from "@tokenbag/types";
import { resolveConfiguration } from "../configuration";
import { CliLoggingEnvironment } from "../environment";
import { assertNever, formatMessage, throwError } from "../utils";
import { BagIterator } from "./BagIterator";

/** Options for creating a bag. */
export interface BagOptions {
    /**
     * Configuration of the bag.
     * @remarks Any problems with the configuration are written to the environment as
     * warnings and the default value is used in place of the invalid one.
     */
    config?: Partial<BagConfiguration>;
    /** Environment to write warnings to. Defaults to the console. */
    environment?: LoggingEnvironment;
}

const defaultEnvironment = new CliLoggingEnvironment();

/**
 * An unordered, non-unique collection of values.
 *
 * Each insertion returns a token that removes exactly that entry, so the
 * elements don't need to be comparable.
 * @remarks The bag is not synchronized. An iteration visits the elements that
 * were present when it started, regardless of later inserts or removals.
 */
export class Bag<Element> implements Iterable<Element> {
    private elements: Element[] = [];
    private tokens: BagToken[] = [];
    private nextTokenValue: BagToken = 0n;
    private readonly config: ResolvedBagConfiguration;
    private readonly environment: LoggingEnvironment;

    constructor(options: BagOptions = {}) {
        const { config, diagnostics } = resolveConfiguration(options.config ?? {});
        this.config = config;
        this.environment = options.environment ?? defaultEnvironment;

        for (const diagnostic of diagnostics)
            this.environment.warn(formatMessage(diagnostic.message));
    }

    /** Index of the first element. Always zero. */
    get startIndex() {
        return 0;
    }

    /** Index one past the last element. */
    get endIndex() {
        return this.elements.length;
    }

    /** Number of elements in the bag. */
    get count() {
        return this.elements.length;
    }

    get isEmpty() {
        return this.elements.length === 0;
    }

    /**
     * Inserts the given value and returns a token that can later be passed to `remove`.
     * @param value - Value to insert.
     */
    insert(value: Element): BagToken {
        const token = this.nextTokenValue;
        this.nextTokenValue++;

        this.elements.push(value);
        this.tokens.push(token);

        return token;
    }

    /**
     * Removes the value that was inserted when the token was returned.
     * @remarks Nothing happens if the value was already removed or the token is from another bag.
     * @param token - Token returned from a call to `insert`.
     */
    remove(token: BagToken) {
        const index = this.findTokenIndex(token);

        if (index === -1) {
            if (this.config.warnOnUnknownToken)
                this.environment.warn(formatMessage(`Token ${token} was not found in the bag.`));
            return;
        }

        this.tokens.splice(index, 1);
        this.elements.splice(index, 1);
    }

    /**
     * Gets the element at the provided index.
     * @param index - Index from `startIndex` up to, but not including, `endIndex`.
     */
    get(index: number): Element {
        if (!Number.isInteger(index) || index < this.startIndex || index >= this.endIndex)
            return throwError(`Index ${index} is out of range [${this.startIndex}, ${this.endIndex}).`);

        return this.elements[index];
    }

    /**
     * Creates a copy of the bag.
     * @remarks Tokens issued before the copy was made address the same entry in both bags.
     */
    clone(): Bag<Element> {
        const bag = new Bag<Element>({ config: this.config, environment: this.environment });
        bag.elements = [...this.elements];
        bag.tokens = [...this.tokens];
        bag.nextTokenValue = this.nextTokenValue;
        return bag;
    }

    [Symbol.iterator]() {
        // iterate a copy so entries removed while iterating, such as a callback disposing itself, are still visited
        return new BagIterator([...this.elements]);
    }

    private findTokenIndex(token: BagToken) {
        switch (this.config.removalScanOrder) {
            case "newestFirst":
                return this.tokens.lastIndexOf(token);
            case "oldestFirst":
                return this.tokens.indexOf(token);
            default:
                return assertNever(this.config.removalScanOrder);
        }
    }
}
