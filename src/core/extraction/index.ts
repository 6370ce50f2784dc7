export * from "./signals";
export * from "./structured-data";
