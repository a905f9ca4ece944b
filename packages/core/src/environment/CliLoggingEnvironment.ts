import type { LoggingEnvironment } from "@tokenbag/types";

/**
 * An implementation of an environment that outputs to the console.
 */
export class CliLoggingEnvironment implements LoggingEnvironment {
    warn(text: string) {
        console.warn(text);
    }
}
