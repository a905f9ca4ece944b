/** Represents an execution environment that warnings are written to. */
export interface LoggingEnvironment {
    warn(text: string): void;
}
