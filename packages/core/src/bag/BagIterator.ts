/** An iterator of a bag's elements in insertion order. */
export class BagIterator<Element> implements IterableIterator<Element> {
    private readonly base: readonly Element[];
    private readonly endIndex: number;
    private nextIndex = 0;

    constructor(base: readonly Element[]) {
        this.base = base;
        this.endIndex = base.length;
    }

    next(): IteratorResult<Element> {
        const currentIndex = this.nextIndex;

        if (currentIndex < this.endIndex) {
            this.nextIndex = currentIndex + 1;
            return { value: this.base[currentIndex], done: false };
        }

        return { value: undefined, done: true };
    }

    [Symbol.iterator]() {
        return this;
    }
}
