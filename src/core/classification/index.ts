export * from "./classifier";
export * from "./patterns";
