export * from "./dynamic-content-resolver";
