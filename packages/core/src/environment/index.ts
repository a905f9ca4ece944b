export * from "./CliLoggingEnvironment";
