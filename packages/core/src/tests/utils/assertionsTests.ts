import { expect } from "chai";
import { assertNever, formatMessage, getError, throwError } from "../../utils";

describe(throwError.name, () => {
    it("should throw an error with the message prefixed", () => {
        expect(() => throwError("Something happened.")).to.throw(Error, "[tokenbag]: Something happened.");
    });
});

describe(getError.name, () => {
    it("should get an error with the message prefixed without throwing", () => {
        expect(getError("Something happened.").message).to.equal("[tokenbag]: Something happened.");
    });
});

describe(formatMessage.name, () => {
    it("should prefix the message", () => {
        expect(formatMessage("text")).to.equal("[tokenbag]: text");
    });
});

describe(assertNever.name, () => {
    it("should throw with the unhandled value serialized and the message prefixed", () => {
        // a value from outside the type system, as unchecked input would be
        const value: never = JSON.parse(`{ "kind": "other" }`);
        expect(() => assertNever(value)).to.throw(Error, `[tokenbag]: Unhandled value: {"kind":"other"}`);
    });
});
