export * from "./results-writer";
